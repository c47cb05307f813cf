/**
 * keyframe-generator.ts
 *
 * Step 2: シーンごとのキーフレーム画像生成。
 * 1 枚目の画像を参照画像として以降のシーンに渡し、人物・スタイルの一貫性を保つ。
 * 処理はシーン順に 1 枚ずつ、リクエスト間に固定の待機を挟む。
 */

import * as fs from "fs";
import * as path from "path";
import { createLogger } from "./logger.js";
import { PipelineError, errorMessage } from "./errors.js";
import type { Scene } from "./storyboard.js";
import type { SeedreamClient } from "./seedream-client.js";
import { sleep } from "./utils/sleep.js";
import {
    PLACEHOLDER_MAX_BYTES,
    sceneFileName,
    writeDiagnostics,
    writePlaceholder,
} from "./utils/media-files.js";

const logger = createLogger("keyframe-generator");

const FIRST_SCENE_PREFIX =
    "High quality commercial photography, cinematic lighting, 4K resolution.";
const LAST_SCENE_PREFIX =
    "Professional product photography, studio lighting, clean background, 4K.";
const MIDDLE_SCENE_PREFIX =
    "High quality commercial photography, consistent style, cinematic lighting. Same person as reference image.";

export function buildKeyframePrompt(index: number, total: number, description: string): string {
    if (index === 0) {
        return `${FIRST_SCENE_PREFIX} ${description}`;
    }
    if (index === total - 1) {
        return `${LAST_SCENE_PREFIX} ${description}`;
    }
    return `${MIDDLE_SCENE_PREFIX} ${description}`;
}

export interface KeyframeGeneratorOptions {
    client: Pick<SeedreamClient, "generate">;
    outputDir: string;
    model: string;
    size: string;
    delayMs: number;
    continueOnError: boolean;
}

export class KeyframeGenerator {
    constructor(private readonly options: KeyframeGeneratorOptions) {}

    async generateAll(scenes: readonly Scene[]): Promise<string[]> {
        const imagePaths: string[] = [];
        let reference: Buffer | undefined;

        for (let i = 0; i < scenes.length; i++) {
            const scene = scenes[i];
            const prompt = buildKeyframePrompt(i, scenes.length, scene.visual_description);

            logger.info(
                { scene: scene.scene_number, withReference: reference !== undefined },
                `キーフレーム生成 (${i + 1}/${scenes.length})`,
            );

            const { imagePath, data } = await this.generateOne(scene.scene_number, prompt, reference);
            imagePaths.push(imagePath);

            // プレースホルダーは参照画像にしない
            if (i === 0 && data && data.length >= PLACEHOLDER_MAX_BYTES) {
                reference = data;
                logger.info({ imagePath }, "1 枚目を参照画像として使用");
            }

            if (i < scenes.length - 1) {
                await sleep(this.options.delayMs);
            }
        }

        logger.info({ count: imagePaths.length }, "キーフレーム生成完了");
        return imagePaths;
    }

    private async generateOne(
        sceneNumber: number,
        prompt: string,
        reference: Buffer | undefined,
    ): Promise<{ imagePath: string; data?: Buffer }> {
        const imagePath = path.join(this.options.outputDir, sceneFileName("scene", sceneNumber, ".png"));

        try {
            const data = await this.options.client.generate({ prompt, referenceImage: reference });
            fs.writeFileSync(imagePath, data);
            return { imagePath, data };
        } catch (err) {
            if (!this.options.continueOnError) {
                throw new PipelineError(
                    "keyframes",
                    `[KeyframeGenerator] シーン ${sceneNumber} の画像生成に失敗しました: ${errorMessage(err)}`,
                    err,
                );
            }

            logger.warn({ scene: sceneNumber, error: errorMessage(err) }, "画像生成に失敗。プレースホルダーで続行");
            writeDiagnostics(
                path.join(this.options.outputDir, sceneFileName("scene", sceneNumber, "_prompt.txt")),
                [
                    `Scene ${sceneNumber} prompt:`,
                    "",
                    prompt,
                    "",
                    `Model: ${this.options.model}`,
                    `Size: ${this.options.size}`,
                    "",
                    `Error: ${errorMessage(err)}`,
                ],
            );
            writePlaceholder(imagePath, `scene ${sceneNumber}`);
            return { imagePath };
        }
    }
}
