/**
 * video-assembler.ts
 *
 * Step 6: クリップの連結と音声の合成。
 * concat demuxer でストリームコピー連結 → 音声を AAC で多重化。
 */

import * as fs from "fs";
import * as path from "path";
import { createLogger } from "./logger.js";
import { PipelineError, errorMessage } from "./errors.js";
import type { Ffmpeg } from "./ffmpeg.js";
import { isUsableMedia } from "./utils/media-files.js";

const logger = createLogger("video-assembler");

export const CONCAT_LIST_FILE = "concat_list.txt";
export const MERGED_VIDEO_FILE = "merged_video.mp4";
export const VIDEO_WITH_AUDIO_FILE = "video_with_audio.mp4";

/**
 * concat demuxer 用のリスト。パスは絶対パス・区切りは "/"、' は '\'' に置換。
 */
export function buildConcatList(clipPaths: readonly string[]): string {
    return clipPaths
        .map((clipPath) => {
            const normalized = path.resolve(clipPath).replace(/\\/g, "/");
            return `file '${normalized.replace(/'/g, "'\\''")}'\n`;
        })
        .join("");
}

export interface VideoAssemblerOptions {
    ffmpeg: Ffmpeg;
    /** concat_list.txt を置くディレクトリ */
    workDir: string;
    /** 連結・合成結果を置くディレクトリ */
    outputDir: string;
}

export class VideoAssembler {
    constructor(private readonly options: VideoAssemblerOptions) {}

    /** 連結対象になるクリップか (プレースホルダーは除外) */
    isUsableClip(clipPath: string): boolean {
        return isUsableMedia(clipPath);
    }

    async concatClips(clipPaths: readonly string[]): Promise<string> {
        const usable = clipPaths.filter((clipPath) => this.isUsableClip(clipPath));
        const skipped = clipPaths.length - usable.length;
        if (skipped > 0) {
            logger.warn({ skipped }, "プレースホルダーのクリップを除外");
        }
        if (usable.length === 0) {
            throw new PipelineError("assemble", "[VideoAssembler] 連結できるクリップがありません");
        }

        const listPath = path.join(this.options.workDir, CONCAT_LIST_FILE);
        fs.writeFileSync(listPath, buildConcatList(usable), "utf-8");

        const outputPath = path.join(this.options.outputDir, MERGED_VIDEO_FILE);
        try {
            await this.options.ffmpeg.run([
                "-f", "concat",
                "-safe", "0",
                "-i", listPath,
                "-c", "copy",
                outputPath,
            ]);
        } catch (err) {
            throw new PipelineError(
                "assemble",
                `[VideoAssembler] クリップの連結に失敗しました: ${errorMessage(err)}`,
                err,
            );
        }

        logger.info({ clips: usable.length, outputPath }, "クリップを連結");
        return outputPath;
    }

    async addAudio(videoPath: string, audioPath: string): Promise<string> {
        const outputPath = path.join(this.options.outputDir, VIDEO_WITH_AUDIO_FILE);
        try {
            await this.options.ffmpeg.run([
                "-i", videoPath,
                "-i", audioPath,
                "-c:v", "copy",
                "-c:a", "aac",
                "-shortest",
                outputPath,
            ]);
        } catch (err) {
            throw new PipelineError(
                "assemble",
                `[VideoAssembler] 音声の合成に失敗しました: ${errorMessage(err)}`,
                err,
            );
        }

        logger.info({ outputPath }, "音声を合成");
        return outputPath;
    }
}
