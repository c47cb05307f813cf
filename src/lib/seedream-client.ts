/**
 * seedream-client.ts
 *
 * Seedream (BytePlus) 画像生成クライアント。
 * テキスト → 画像、または参照画像付きで同一人物・同一スタイルの画像を生成する。
 * 生成結果は URL で返るため、そのままダウンロードしてバイト列で返す。
 */

import { z } from "zod";
import type { ArkClient } from "./ark-client.js";
import { toPngDataUrl } from "./utils/media-files.js";

export const IMAGE_GENERATIONS_ENDPOINT = "images/generations";

const ImageGenerationResponseSchema = z.object({
    data: z
        .array(
            z.object({
                url: z.string().url().optional(),
            }).passthrough()
        )
        .default([]),
}).passthrough();

export interface SeedreamOptions {
    model: string;
    size: string;
    requestTimeoutMs?: number;
    downloadTimeoutMs?: number;
}

export interface GenerateKeyframeRequest {
    prompt: string;
    /** 一貫性のための参照画像 (PNG バイト列) */
    referenceImage?: Buffer;
}

export class SeedreamClient {
    private readonly ark: ArkClient;
    private readonly model: string;
    private readonly size: string;
    private readonly requestTimeoutMs: number;
    private readonly downloadTimeoutMs: number;

    constructor(ark: ArkClient, options: SeedreamOptions) {
        this.ark = ark;
        this.model = options.model;
        this.size = options.size;
        this.requestTimeoutMs = options.requestTimeoutMs ?? 120_000;
        this.downloadTimeoutMs = options.downloadTimeoutMs ?? 60_000;
    }

    buildPayload(request: GenerateKeyframeRequest): Record<string, unknown> {
        const payload: Record<string, unknown> = {
            model: this.model,
            prompt: request.prompt,
            sequential_image_generation: "disabled",
            response_format: "url",
            size: this.size,
            stream: false,
            watermark: false,
        };
        if (request.referenceImage) {
            payload.image = toPngDataUrl(request.referenceImage);
        }
        return payload;
    }

    async generate(request: GenerateKeyframeRequest): Promise<Buffer> {
        if (!request.prompt.trim()) {
            throw new Error("[SeedreamClient] prompt は必須です。空のプロンプトは指定できません。");
        }

        const result = await this.ark.postJson(
            IMAGE_GENERATIONS_ENDPOINT,
            this.buildPayload(request),
            ImageGenerationResponseSchema,
            this.requestTimeoutMs,
        );

        const imageUrl = result.data[0]?.url;
        if (!imageUrl) {
            throw new Error("[SeedreamClient] レスポンスに画像 URL が含まれていません");
        }

        return this.ark.download(imageUrl, this.downloadTimeoutMs);
    }
}
