/**
 * clip-generator.ts
 *
 * Step 3: キーフレーム画像 → シーンごとの動画クリップ。
 * プレースホルダー画像の場合は API を呼ばずにプレースホルダークリップを残す。
 */

import * as fs from "fs";
import * as path from "path";
import { createLogger } from "./logger.js";
import { PipelineError, errorMessage } from "./errors.js";
import type { Scene } from "./storyboard.js";
import type { SeedanceClient } from "./seedance-client.js";
import { sleep } from "./utils/sleep.js";
import {
    isUsableMedia,
    sceneFileName,
    writeDiagnostics,
    writePlaceholder,
} from "./utils/media-files.js";

const logger = createLogger("clip-generator");

export interface ClipGeneratorOptions {
    client: Pick<SeedanceClient, "generate">;
    outputDir: string;
    model: string;
    delayMs: number;
    continueOnError: boolean;
}

export class ClipGenerator {
    constructor(private readonly options: ClipGeneratorOptions) {}

    async generateAll(imagePaths: readonly string[], scenes: readonly Scene[]): Promise<string[]> {
        if (imagePaths.length !== scenes.length) {
            throw new PipelineError(
                "clips",
                `[ClipGenerator] 画像数 (${imagePaths.length}) とシーン数 (${scenes.length}) が一致しません`,
            );
        }

        const clipPaths: string[] = [];

        for (let i = 0; i < scenes.length; i++) {
            const scene = scenes[i];
            const imagePath = imagePaths[i];
            const clipPath = path.join(this.options.outputDir, sceneFileName("clip", scene.scene_number, ".mp4"));

            logger.info(
                { scene: scene.scene_number, durationSec: scene.duration, image: path.basename(imagePath) },
                `クリップ生成 (${i + 1}/${scenes.length})`,
            );

            if (!isUsableMedia(imagePath)) {
                logger.warn({ scene: scene.scene_number }, "プレースホルダー画像のためスキップ");
                writePlaceholder(clipPath, `video clip ${scene.scene_number}`);
                clipPaths.push(clipPath);
                continue;
            }

            await this.generateOne(scene, imagePath, clipPath);
            clipPaths.push(clipPath);

            if (i < scenes.length - 1) {
                await sleep(this.options.delayMs);
            }
        }

        logger.info({ count: clipPaths.length }, "クリップ生成完了");
        return clipPaths;
    }

    private async generateOne(scene: Scene, imagePath: string, clipPath: string): Promise<void> {
        try {
            const video = await this.options.client.generate(
                fs.readFileSync(imagePath),
                scene.action,
                scene.duration,
                (status, attempt, maxAttempts) => {
                    logger.info({ scene: scene.scene_number, status }, `ステータス ${attempt}/${maxAttempts}`);
                },
            );
            fs.writeFileSync(clipPath, video);
        } catch (err) {
            if (!this.options.continueOnError) {
                throw new PipelineError(
                    "clips",
                    `[ClipGenerator] シーン ${scene.scene_number} の動画生成に失敗しました: ${errorMessage(err)}`,
                    err,
                );
            }

            logger.warn({ scene: scene.scene_number, error: errorMessage(err) }, "動画生成に失敗。プレースホルダーで続行");
            writeDiagnostics(
                path.join(this.options.outputDir, sceneFileName("clip", scene.scene_number, "_motion.txt")),
                [
                    `Scene ${scene.scene_number} video parameters:`,
                    "",
                    `Input image: ${imagePath}`,
                    `Duration: ${scene.duration}s`,
                    `Motion prompt: ${scene.action}`,
                    "",
                    `Model: ${this.options.model}`,
                    "",
                    `Error: ${errorMessage(err)}`,
                ],
            );
            writePlaceholder(clipPath, `video clip ${scene.scene_number}`);
        }
    }
}
