/**
 * storyboard-writer.ts
 *
 * ストーリーボード生成用の LLM ラッパー。
 * Claude (Anthropic Messages API) と Gemini (@google/genai) を同じインターフェースで扱う。
 */

import Anthropic from "@anthropic-ai/sdk";
import { GoogleGenAI } from "@google/genai";
import type { StoryboardSettings } from "./config.js";
import { ConfigError } from "./errors.js";

export interface StoryboardWriter {
    readonly name: string;
    write(prompt: string): Promise<string>;
}

export class AnthropicStoryboardWriter implements StoryboardWriter {
    readonly name = "anthropic";
    private client: Anthropic;
    private model: string;
    private maxTokens: number;

    constructor(options: { apiKey: string; model: string; maxTokens: number }) {
        this.client = new Anthropic({ apiKey: options.apiKey });
        this.model = options.model;
        this.maxTokens = options.maxTokens;
    }

    async write(prompt: string): Promise<string> {
        const message = await this.client.messages.create({
            model: this.model,
            max_tokens: this.maxTokens,
            messages: [{ role: "user", content: prompt }],
        });

        const texts: string[] = [];
        for (const block of message.content) {
            if (block.type === "text") {
                texts.push(block.text);
            }
        }
        return texts.join("");
    }
}

export class GeminiStoryboardWriter implements StoryboardWriter {
    readonly name = "gemini";
    private ai: GoogleGenAI;
    private model: string;
    private maxTokens: number;

    constructor(options: { apiKey: string; model: string; maxTokens: number }) {
        this.ai = new GoogleGenAI({ apiKey: options.apiKey });
        this.model = options.model;
        this.maxTokens = options.maxTokens;
    }

    async write(prompt: string): Promise<string> {
        const response = await this.ai.models.generateContent({
            model: this.model,
            contents: prompt,
            config: {
                maxOutputTokens: this.maxTokens,
                responseMimeType: "application/json",
            },
        });
        return response.text ?? "";
    }
}

export function createStoryboardWriter(settings: StoryboardSettings): StoryboardWriter {
    if (settings.provider === "gemini") {
        if (!settings.geminiApiKey) {
            throw new ConfigError("[StoryboardWriter] GEMINI_API_KEY が設定されていません。");
        }
        return new GeminiStoryboardWriter({
            apiKey: settings.geminiApiKey,
            model: settings.geminiModel,
            maxTokens: settings.maxTokens,
        });
    }

    if (!settings.anthropicApiKey) {
        throw new ConfigError("[StoryboardWriter] ANTHROPIC_API_KEY が設定されていません。");
    }
    return new AnthropicStoryboardWriter({
        apiKey: settings.anthropicApiKey,
        model: settings.anthropicModel,
        maxTokens: settings.maxTokens,
    });
}
