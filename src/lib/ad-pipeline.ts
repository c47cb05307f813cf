/**
 * ad-pipeline.ts
 *
 * 広告動画生成のオーケストレーター。
 * ストーリー → ストーリーボード → キーフレーム → クリップ → 色合わせ → 音声 → 連結 → テキスト
 * の順に各ステージを直列に実行する。
 *
 * 各ステージは Pick<> の狭いインターフェースで注入するため、テストではフェイクに差し替えられる。
 * 実際の配線は createAdPipeline() を使う。
 *
 * Ad Pipeline — Orchestration Layer
 */

import * as path from "path";
import { createLogger } from "./logger.js";
import { PipelineError, errorMessage } from "./errors.js";
import { assertApiKeys, type AppConfig } from "./config.js";
import { totalDuration, type Scene } from "./storyboard.js";
import { StoryboardGenerator, STORYBOARD_FILE } from "./storyboard-generator.js";
import { createStoryboardWriter } from "./storyboard-writer.js";
import { ArkClient } from "./ark-client.js";
import { SeedreamClient } from "./seedream-client.js";
import { SeededitClient } from "./seededit-client.js";
import { SeedanceClient, clipDurationFor } from "./seedance-client.js";
import { KeyframeGenerator } from "./keyframe-generator.js";
import { ImageConsistencyProcessor } from "./image-consistency.js";
import { ClipGenerator } from "./clip-generator.js";
import { Ffmpeg, type CommandRunner } from "./ffmpeg.js";
import { ColorMatcher } from "./color-matcher.js";
import { AudioGenerator } from "./audio-generator.js";
import { VideoAssembler } from "./video-assembler.js";
import { TextOverlay } from "./text-overlay.js";
import { CompatExporter } from "./compat-exporter.js";
import { createOutputLayout, ensureOutputLayout, type OutputLayout } from "./utils/media-files.js";

const logger = createLogger("ad-pipeline");

// ============================================================
// Types
// ============================================================

export interface AdPipelineStages {
    storyboard: Pick<StoryboardGenerator, "loadStory" | "generate" | "load" | "save">;
    keyframes: Pick<KeyframeGenerator, "generateAll">;
    /** 省略時は画像一貫性補正をスキップ */
    consistency?: Pick<ImageConsistencyProcessor, "processAll">;
    clips: Pick<ClipGenerator, "generateAll">;
    /** 省略時は色合わせをスキップ */
    colorMatcher?: Pick<ColorMatcher, "matchClips">;
    audio: Pick<AudioGenerator, "createTimeline">;
    assembler: Pick<VideoAssembler, "concatClips" | "addAudio" | "isUsableClip">;
    textOverlay: Pick<TextOverlay, "addBrandText">;
    /** 省略時は互換形式への書き出しをスキップ */
    compatExporter?: Pick<CompatExporter, "export">;
}

export type AdPipelineStepName =
    | "storyboard"
    | "keyframes"
    | "consistency"
    | "clips"
    | "color_match"
    | "audio"
    | "assemble"
    | "text_overlay"
    | "compat_export";

export type AdPipelineProgressCallback = (
    step: AdPipelineStepName,
    index: number,
    total: number,
) => void;

export interface AdPipelineOptions {
    /** 音声生成に失敗しても無音で続行する */
    continueOnError?: boolean;
    onProgress?: AdPipelineProgressCallback;
}

export interface AdPipelineRunRequest {
    storyPath: string;
    brandName: string;
    /** 既存の storyboard.json を使い、LLM ステップをスキップする */
    storyboardPath?: string;
}

export interface AdPipelineResult {
    scenes: Scene[];
    storyboardPath: string;
    imagePaths: string[];
    clipPaths: string[];
    /** 色合わせ後のクリップ (色合わせ無効時は clipPaths と同じ) */
    finalClipPaths: string[];
    audioPath?: string;
    mergedVideoPath: string;
    videoWithAudioPath?: string;
    finalVideoPath: string;
    compatibleVideoPath?: string;
    elapsedMs: number;
}

// ============================================================
// Pipeline
// ============================================================

export class AdPipeline {
    private readonly stages: AdPipelineStages;
    private readonly continueOnError: boolean;
    private readonly onProgress?: AdPipelineProgressCallback;

    constructor(stages: AdPipelineStages, options?: AdPipelineOptions) {
        this.stages = stages;
        this.continueOnError = options?.continueOnError ?? false;
        this.onProgress = options?.onProgress;
    }

    /** 有効なステップ名を実行順に返す */
    plannedSteps(): AdPipelineStepName[] {
        const steps: AdPipelineStepName[] = ["storyboard", "keyframes"];
        if (this.stages.consistency) steps.push("consistency");
        steps.push("clips");
        if (this.stages.colorMatcher) steps.push("color_match");
        steps.push("audio", "assemble", "text_overlay");
        if (this.stages.compatExporter) steps.push("compat_export");
        return steps;
    }

    async run(request: AdPipelineRunRequest): Promise<AdPipelineResult> {
        const startTime = Date.now();
        const steps = this.plannedSteps();
        const begin = (step: AdPipelineStepName): void => {
            const index = steps.indexOf(step) + 1;
            logger.info({ step }, `Step ${index}/${steps.length}`);
            this.onProgress?.(step, index, steps.length);
        };

        logger.info({ brandName: request.brandName, steps }, "広告動画の生成を開始");

        // --- Storyboard ---
        begin("storyboard");
        let scenes: Scene[];
        if (request.storyboardPath) {
            scenes = this.stages.storyboard.load(request.storyboardPath);
        } else {
            const story = this.stages.storyboard.loadStory(request.storyPath);
            scenes = await this.stages.storyboard.generate(story);
        }
        const { jsonPath: storyboardPath } = this.stages.storyboard.save(scenes);

        // --- Keyframes ---
        begin("keyframes");
        let imagePaths = await this.stages.keyframes.generateAll(scenes);

        if (this.stages.consistency) {
            begin("consistency");
            imagePaths = await this.stages.consistency.processAll(imagePaths, scenes);
        }

        // --- Clips ---
        begin("clips");
        const clipPaths = await this.stages.clips.generateAll(imagePaths, scenes);

        let finalClipPaths = clipPaths;
        if (this.stages.colorMatcher) {
            begin("color_match");
            finalClipPaths = await this.stages.colorMatcher.matchClips(
                clipPaths.map((clipPath, i) => ({
                    path: clipPath,
                    plannedDuration: clipDurationFor(scenes[i]?.duration ?? 0),
                })),
            );
        }

        // 映像に残るシーンだけを、実際のクリップ尺で音声・テキストに使う
        const videoScenes = scenes.flatMap((scene, i) => {
            const clipPath = finalClipPaths[i];
            return clipPath !== undefined && this.stages.assembler.isUsableClip(clipPath)
                ? [{ ...scene, duration: clipDurationFor(scene.duration) }]
                : [];
        });

        // --- Audio ---
        begin("audio");
        const audioPath = await this.createAudio(videoScenes);

        // --- Assemble ---
        begin("assemble");
        const mergedVideoPath = await this.stages.assembler.concatClips(finalClipPaths);
        const videoWithAudioPath = audioPath
            ? await this.stages.assembler.addAudio(mergedVideoPath, audioPath)
            : undefined;

        // --- Text overlay ---
        begin("text_overlay");
        const finalVideoPath = await this.stages.textOverlay.addBrandText({
            videoPath: videoWithAudioPath ?? mergedVideoPath,
            brandName: request.brandName,
            fallbackDuration: totalDuration(videoScenes),
        });

        let compatibleVideoPath: string | undefined;
        if (this.stages.compatExporter) {
            begin("compat_export");
            compatibleVideoPath = await this.stages.compatExporter.export(finalVideoPath);
        }

        const elapsedMs = Date.now() - startTime;
        logger.info(
            { finalVideoPath, compatibleVideoPath, elapsedSec: Math.round(elapsedMs / 1000) },
            "広告動画の生成が完了しました",
        );

        return {
            scenes,
            storyboardPath,
            imagePaths,
            clipPaths,
            finalClipPaths,
            audioPath,
            mergedVideoPath,
            videoWithAudioPath,
            finalVideoPath,
            compatibleVideoPath,
            elapsedMs,
        };
    }

    private async createAudio(scenes: Scene[]): Promise<string | undefined> {
        if (scenes.length === 0) {
            logger.warn("映像に使えるクリップがないため音声生成をスキップ");
            return undefined;
        }
        try {
            return await this.stages.audio.createTimeline(scenes);
        } catch (err) {
            if (!this.continueOnError) {
                throw err;
            }
            logger.warn({ error: errorMessage(err) }, "音声生成に失敗。無音で続行");
            return undefined;
        }
    }
}

// ============================================================
// Factory
// ============================================================

export interface CreateAdPipelineOptions {
    /** 既存の storyboard.json を使う (LLM の API キー不要) */
    useExistingStoryboard?: boolean;
    /** FFmpeg 実行の差し替え (テスト用) */
    runner?: CommandRunner;
    onProgress?: AdPipelineProgressCallback;
}

export interface AdPipelineBundle {
    pipeline: AdPipeline;
    layout: OutputLayout;
}

/**
 * 設定から実ステージを配線し、出力ディレクトリ構成を作成する。
 */
export function createAdPipeline(
    config: AppConfig,
    options?: CreateAdPipelineOptions,
): AdPipelineBundle {
    const useExistingStoryboard = options?.useExistingStoryboard ?? false;
    assertApiKeys(config, { storyboardWriter: !useExistingStoryboard });

    const layout = createOutputLayout(config.outputDir);
    ensureOutputLayout(layout);

    const { ark: arkSettings } = config;
    if (!arkSettings.apiKey) {
        throw new PipelineError("config", "[createAdPipeline] BYTEPLUS_API_KEY が設定されていません");
    }
    const ark = new ArkClient({ apiKey: arkSettings.apiKey, baseUrl: arkSettings.baseUrl });

    const ffmpeg = new Ffmpeg({
        ffmpegPath: config.ffmpeg.ffmpegPath,
        ffprobePath: config.ffmpeg.ffprobePath,
        timeoutMs: config.ffmpeg.timeoutMs,
        runner: options?.runner,
    });

    const stages: AdPipelineStages = {
        storyboard: new StoryboardGenerator({
            writer: useExistingStoryboard ? undefined : createStoryboardWriter(config.storyboard),
            outputDir: layout.storyboard,
            sceneCount: config.storyboard.sceneCount,
        }),
        keyframes: new KeyframeGenerator({
            client: new SeedreamClient(ark, { model: arkSettings.imageModel, size: arkSettings.imageSize }),
            outputDir: layout.images,
            model: arkSettings.imageModel,
            size: arkSettings.imageSize,
            delayMs: arkSettings.imageDelayMs,
            continueOnError: config.continueOnError,
        }),
        consistency: config.imageConsistency
            ? new ImageConsistencyProcessor({
                    client: new SeededitClient(ark, { model: arkSettings.editModel, size: arkSettings.imageSize }),
                    delayMs: arkSettings.imageDelayMs,
                    continueOnError: config.continueOnError,
                })
            : undefined,
        clips: new ClipGenerator({
            client: new SeedanceClient(ark, {
                model: arkSettings.videoModel,
                ratio: arkSettings.videoRatio,
                resolution: arkSettings.videoResolution,
                fps: arkSettings.fps,
                pollIntervalMs: arkSettings.pollIntervalMs,
                maxPollAttempts: arkSettings.maxPollAttempts,
            }),
            outputDir: layout.clips,
            model: arkSettings.videoModel,
            delayMs: arkSettings.clipDelayMs,
            continueOnError: config.continueOnError,
        }),
        colorMatcher: config.colorMatch
            ? new ColorMatcher({
                    ffmpeg,
                    outputDir: layout.colorMatched,
                    continueOnError: config.continueOnError,
                })
            : undefined,
        audio: new AudioGenerator({ ffmpeg, outputDir: layout.audio }),
        assembler: new VideoAssembler({ ffmpeg, workDir: layout.clips, outputDir: layout.final }),
        textOverlay: new TextOverlay({ ffmpeg, fontFile: config.fontFile }),
        compatExporter: config.exportCompatible ? new CompatExporter(ffmpeg) : undefined,
    };

    logger.debug(
        { outputDir: layout.root, storyboard: path.join(layout.storyboard, STORYBOARD_FILE) },
        "パイプラインを構成",
    );

    return {
        pipeline: new AdPipeline(stages, {
            continueOnError: config.continueOnError,
            onProgress: options?.onProgress,
        }),
        layout,
    };
}
