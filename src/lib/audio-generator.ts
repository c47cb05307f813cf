/**
 * audio-generator.ts
 *
 * Step 5: シーンごとの BGM / 環境音を FFmpeg の lavfi で合成し、
 * 1 本のタイムラインに連結してフェードを付ける。
 *
 * Ad Pipeline — Audio Layer
 */

import * as path from "path";
import { createLogger } from "./logger.js";
import { PipelineError, errorMessage } from "./errors.js";
import { formatNumber, type Ffmpeg } from "./ffmpeg.js";
import type { AudioType, Scene } from "./storyboard.js";
import { sceneFileName } from "./utils/media-files.js";

const logger = createLogger("audio-generator");

export const FINAL_AUDIO_FILE = "final_audio.mp3";
export const FADED_AUDIO_FILE = "final_audio_faded.mp3";

const FADE_IN_SECONDS = 1;
const FADE_OUT_SECONDS = 2;

export interface AudioCue {
    sceneNumber: number;
    type: AudioType;
    duration: number;
}

export function cuesFromScenes(scenes: readonly Scene[]): AudioCue[] {
    return scenes.map((scene) => ({
        sceneNumber: scene.scene_number,
        type: scene.audio_type,
        duration: scene.duration,
    }));
}

// ============================================================
// コマンド組み立て
// ============================================================

function lavfiInput(source: string): string[] {
    return ["-f", "lavfi", "-i", source];
}

/**
 * 1 キュー分の ffmpeg 引数 (先頭の -hide_banner -y は Ffmpeg.run が付与)
 */
export function buildCueArgs(type: AudioType, duration: number, outputPath: string): string[] {
    const d = formatNumber(duration);

    switch (type) {
        case "cafe":
            return [
                ...lavfiInput(`anoisesrc=d=${d}:c=brown:r=44100:a=0.3`),
                "-af", "highpass=f=200,lowpass=f=3000,volume=0.4",
                outputPath,
            ];
        case "product":
            return [
                ...lavfiInput(`sine=frequency=880:duration=${d}`),
                ...lavfiInput(`sine=frequency=1046:duration=${d}`),
                "-filter_complex", "[0:a][1:a]amix=inputs=2:duration=longest,volume=0.3,highpass=f=500",
                outputPath,
            ];
        case "calm":
            return [
                ...lavfiInput(`sine=frequency=440:duration=${d}`),
                ...lavfiInput(`sine=frequency=523:duration=${d}`),
                ...lavfiInput(`sine=frequency=659:duration=${d}`),
                "-filter_complex",
                "[0:a][1:a][2:a]amix=inputs=3:duration=longest:dropout_transition=2,volume=0.2,lowpass=f=2000",
                outputPath,
            ];
    }
}

export function buildConcatArgs(inputs: readonly string[], outputPath: string): string[] {
    return [
        ...inputs.flatMap((input) => ["-i", input]),
        "-filter_complex", `concat=n=${inputs.length}:v=0:a=1[out]`,
        "-map", "[out]",
        outputPath,
    ];
}

export function buildFadeArgs(inputPath: string, duration: number, outputPath: string): string[] {
    const fadeOutStart = Math.max(0, duration - FADE_OUT_SECONDS);
    return [
        "-i", inputPath,
        "-af",
        `afade=t=in:st=0:d=${FADE_IN_SECONDS},afade=t=out:st=${formatNumber(fadeOutStart)}:d=${FADE_OUT_SECONDS}`,
        outputPath,
    ];
}

// ============================================================
// AudioGenerator
// ============================================================

export interface AudioGeneratorOptions {
    ffmpeg: Ffmpeg;
    outputDir: string;
}

export class AudioGenerator {
    private readonly ffmpeg: Ffmpeg;
    private readonly outputDir: string;

    constructor(options: AudioGeneratorOptions) {
        this.ffmpeg = options.ffmpeg;
        this.outputDir = options.outputDir;
    }

    /**
     * 全シーン分のキューを生成・連結し、フェード済みの音声パスを返す。
     */
    async createTimeline(scenes: readonly Scene[]): Promise<string> {
        const cues = cuesFromScenes(scenes);
        if (cues.length === 0) {
            throw new PipelineError("audio", "[AudioGenerator] シーンがありません");
        }

        const segments: string[] = [];
        for (const cue of cues) {
            segments.push(await this.generateCue(cue));
        }

        const merged = await this.mergeSegments(segments);
        const timelineSeconds = cues.reduce((sum, cue) => sum + cue.duration, 0);
        return this.addFade(merged, timelineSeconds);
    }

    async generateCue(cue: AudioCue): Promise<string> {
        const outputPath = path.join(
            this.outputDir,
            sceneFileName("scene", cue.sceneNumber, `_${cue.type}.mp3`),
        );
        logger.info({ scene: cue.sceneNumber, type: cue.type, durationSec: cue.duration }, "音声キュー生成");

        try {
            await this.ffmpeg.run(buildCueArgs(cue.type, cue.duration, outputPath));
        } catch (err) {
            throw new PipelineError(
                "audio",
                `[AudioGenerator] シーン ${cue.sceneNumber} の音声生成に失敗しました: ${errorMessage(err)}`,
                err,
            );
        }
        return outputPath;
    }

    async mergeSegments(segments: readonly string[]): Promise<string> {
        if (segments.length === 1) {
            return segments[0];
        }

        const outputPath = path.join(this.outputDir, FINAL_AUDIO_FILE);
        try {
            await this.ffmpeg.run(buildConcatArgs(segments, outputPath));
        } catch (err) {
            throw new PipelineError(
                "audio",
                `[AudioGenerator] 音声の連結に失敗しました: ${errorMessage(err)}`,
                err,
            );
        }
        logger.info({ segments: segments.length, outputPath }, "音声を連結");
        return outputPath;
    }

    /**
     * フェードイン / アウトを付与する。失敗時はフェードなしの音声を返す。
     */
    async addFade(audioPath: string, fallbackDuration: number): Promise<string> {
        const duration = (await this.ffmpeg.probeDuration(audioPath)) ?? fallbackDuration;
        const outputPath = path.join(this.outputDir, FADED_AUDIO_FILE);

        try {
            await this.ffmpeg.run(buildFadeArgs(audioPath, duration, outputPath));
            return outputPath;
        } catch (err) {
            logger.warn({ error: errorMessage(err) }, "フェード付与に失敗。元の音声を使用");
            return audioPath;
        }
    }
}
