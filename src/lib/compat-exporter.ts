/**
 * compat-exporter.ts
 *
 * 再生互換性の高い形式 (H.264 Baseline / AAC) への再エンコード。
 * 古いプレーヤーやモバイル端末でも再生できる MP4 を書き出す。
 */

import * as fs from "fs";
import * as path from "path";
import { createLogger } from "./logger.js";
import { PipelineError, errorMessage } from "./errors.js";
import type { Ffmpeg } from "./ffmpeg.js";

const logger = createLogger("compat-exporter");

export const COMPAT_SUFFIX = "_WINDOWS_COMPATIBLE";

export function defaultCompatOutputPath(inputPath: string): string {
    const parsed = path.parse(inputPath);
    return path.join(parsed.dir, `${parsed.name}${COMPAT_SUFFIX}.mp4`);
}

export function buildCompatArgs(inputPath: string, outputPath: string): string[] {
    return [
        "-i", inputPath,
        "-c:v", "libx264",
        "-profile:v", "baseline",
        "-level", "3.0",
        "-pix_fmt", "yuv420p",
        "-crf", "23",
        "-preset", "medium",
        "-c:a", "aac",
        "-b:a", "192k",
        "-ar", "48000",
        "-ac", "2",
        "-movflags", "+faststart",
        "-max_muxing_queue_size", "1024",
        outputPath,
    ];
}

export class CompatExporter {
    constructor(private readonly ffmpeg: Ffmpeg) {}

    async export(inputPath: string, outputPath?: string): Promise<string> {
        if (!fs.existsSync(inputPath)) {
            throw new PipelineError(
                "compat_export",
                `[CompatExporter] 入力動画が見つかりません: ${inputPath}`,
            );
        }

        const target = outputPath ?? defaultCompatOutputPath(inputPath);
        logger.info({ inputPath, outputPath: target }, "互換形式へ変換");

        try {
            await this.ffmpeg.run(buildCompatArgs(inputPath, target));
        } catch (err) {
            throw new PipelineError(
                "compat_export",
                `[CompatExporter] 変換に失敗しました: ${errorMessage(err)}`,
                err,
            );
        }

        const sizeMb = fs.existsSync(target) ? fs.statSync(target).size / (1024 * 1024) : 0;
        logger.info({ outputPath: target, sizeMb: Number(sizeMb.toFixed(2)) }, "変換完了");
        return target;
    }
}
