/**
 * storyboard-generator.ts
 *
 * Step 1: ストーリー → ストーリーボード。
 * LLM 応答をパースし、storyboard.json と読みやすいテキスト版を保存する。
 */

import * as fs from "fs";
import * as path from "path";
import { createLogger } from "./logger.js";
import { PipelineError, StoryboardParseError, errorMessage } from "./errors.js";
import {
    buildStoryboardPrompt,
    parseStoryboard,
    renderReadableStoryboard,
    totalDuration,
    type Scene,
} from "./storyboard.js";
import type { StoryboardWriter } from "./storyboard-writer.js";

const logger = createLogger("storyboard-generator");

export const STORYBOARD_FILE = "storyboard.json";
export const READABLE_STORYBOARD_FILE = "storyboard_readable.txt";

export interface StoryboardGeneratorOptions {
    /** 既存の storyboard.json だけを使う場合は省略可 */
    writer?: StoryboardWriter;
    outputDir: string;
    sceneCount: number;
}

export class StoryboardGenerator {
    private readonly writer?: StoryboardWriter;
    private readonly outputDir: string;
    private readonly sceneCount: number;

    constructor(options: StoryboardGeneratorOptions) {
        this.writer = options.writer;
        this.outputDir = options.outputDir;
        this.sceneCount = options.sceneCount;
    }

    loadStory(storyPath: string): string {
        if (!fs.existsSync(storyPath)) {
            throw new PipelineError("storyboard", `[StoryboardGenerator] ストーリーファイルが見つかりません: ${storyPath}`);
        }
        const story = fs.readFileSync(storyPath, "utf-8");
        if (story.trim().length === 0) {
            throw new PipelineError("storyboard", `[StoryboardGenerator] ストーリーファイルが空です: ${storyPath}`);
        }
        logger.info({ storyPath, characters: story.length }, "ストーリー読み込み完了");
        return story;
    }

    async generate(story: string): Promise<Scene[]> {
        const writer = this.writer;
        if (!writer) {
            throw new PipelineError("storyboard", "[StoryboardGenerator] ストーリーボード生成用の LLM が設定されていません");
        }
        const prompt = buildStoryboardPrompt(story, this.sceneCount);

        logger.info({ provider: writer.name, sceneCount: this.sceneCount }, "ストーリーボード生成中...");

        let answer: string;
        try {
            answer = await writer.write(prompt);
        } catch (err) {
            throw new PipelineError(
                "storyboard",
                `[StoryboardGenerator] ${writer.name} の呼び出しに失敗しました: ${errorMessage(err)}`,
                err,
            );
        }

        let scenes: Scene[];
        try {
            scenes = parseStoryboard(answer);
        } catch (err) {
            if (err instanceof StoryboardParseError) {
                logger.error({ excerpt: err.excerpt }, "ストーリーボードのパースに失敗");
            }
            throw err;
        }

        if (scenes.length !== this.sceneCount) {
            logger.warn(
                { expected: this.sceneCount, actual: scenes.length },
                "シーン数が指定と異なります。そのまま続行します",
            );
        }

        this.save(scenes);
        return scenes;
    }

    /**
     * 既存の storyboard.json を読み込む (LLM ステップのスキップ用)
     */
    load(storyboardPath: string): Scene[] {
        if (!fs.existsSync(storyboardPath)) {
            throw new PipelineError(
                "storyboard",
                `[StoryboardGenerator] ストーリーボードが見つかりません: ${storyboardPath}`,
            );
        }
        const scenes = parseStoryboard(fs.readFileSync(storyboardPath, "utf-8"));
        logger.info({ storyboardPath, scenes: scenes.length }, "既存のストーリーボードを使用");
        return scenes;
    }

    save(scenes: Scene[]): { jsonPath: string; readablePath: string } {
        fs.mkdirSync(this.outputDir, { recursive: true });

        const jsonPath = path.join(this.outputDir, STORYBOARD_FILE);
        fs.writeFileSync(jsonPath, JSON.stringify(scenes, null, 2), "utf-8");

        const readablePath = path.join(this.outputDir, READABLE_STORYBOARD_FILE);
        fs.writeFileSync(readablePath, renderReadableStoryboard(scenes), "utf-8");

        logger.info(
            {
                scenes: scenes.length,
                totalDurationSec: totalDuration(scenes),
                jsonPath,
                readablePath,
            },
            "ストーリーボード保存完了",
        );

        return { jsonPath, readablePath };
    }
}
