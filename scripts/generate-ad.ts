#!/usr/bin/env node
/**
 * generate-ad.ts
 *
 * 広告動画生成 CLI
 *
 * 使い方:
 *   npx tsx scripts/generate-ad.ts --config config.json --story story.txt
 *   npx tsx scripts/generate-ad.ts --storyboard output/01_storyboard/storyboard.json
 *   npx tsx scripts/generate-ad.ts convert output/04_final/final_with_text.mp4
 *
 * 環境変数 (.env 可):
 *   ANTHROPIC_API_KEY / GEMINI_API_KEY: ストーリーボード生成
 *   BYTEPLUS_API_KEY                  : 画像・動画生成 (必須)
 *   FFMPEG_PATH / FFPROBE_PATH        : FFmpeg の場所 (省略時は PATH から)
 *   LOG_LEVEL                         : pino のログレベル
 */

import "dotenv/config";
import { Command } from "commander";
import { ConfigFileSchema, loadConfig, resolveConfig, type AppConfig } from "../src/lib/config.js";
import { createAdPipeline } from "../src/lib/ad-pipeline.js";
import { CompatExporter } from "../src/lib/compat-exporter.js";
import { Ffmpeg } from "../src/lib/ffmpeg.js";
import { PipelineError, errorMessage } from "../src/lib/errors.js";
import { createLogger, setLogLevel } from "../src/lib/logger.js";

const logger = createLogger("cli");

interface RunOptions {
    config: string;
    story?: string;
    brand?: string;
    storyboard?: string;
    colorMatch: boolean;
    exportCompatible?: boolean;
    continueOnError?: boolean;
    verbose?: boolean;
}

function applyOverrides(config: AppConfig, opts: RunOptions): AppConfig {
    return {
        ...config,
        storyPath: opts.story ?? config.storyPath,
        brandName: opts.brand ?? config.brandName,
        colorMatch: opts.colorMatch === false ? false : config.colorMatch,
        exportCompatible: opts.exportCompatible ?? config.exportCompatible,
        continueOnError: opts.continueOnError ?? config.continueOnError,
    };
}

async function runPipeline(opts: RunOptions): Promise<void> {
    if (opts.verbose) {
        setLogLevel("debug");
    }

    const config = applyOverrides(loadConfig(opts.config), opts);
    const { pipeline, layout } = createAdPipeline(config, {
        useExistingStoryboard: opts.storyboard !== undefined,
    });

    logger.info({ outputDir: layout.root, brandName: config.brandName }, "出力先");

    const result = await pipeline.run({
        storyPath: config.storyPath,
        brandName: config.brandName,
        storyboardPath: opts.storyboard,
    });

    console.log("");
    console.log("=".repeat(60));
    console.log("広告動画の生成が完了しました");
    console.log("=".repeat(60));
    console.log(`ストーリーボード: ${result.storyboardPath}`);
    console.log(`最終動画:         ${result.finalVideoPath}`);
    if (result.compatibleVideoPath) {
        console.log(`互換形式:         ${result.compatibleVideoPath}`);
    }
    console.log(`所要時間:         ${(result.elapsedMs / 1000).toFixed(1)}s`);
}

async function convertVideo(input: string, output: string | undefined): Promise<void> {
    const { ffmpeg: settings } = resolveConfig(ConfigFileSchema.parse({}));
    const exporter = new CompatExporter(new Ffmpeg(settings));
    const outputPath = await exporter.export(input, output);
    console.log(`変換完了: ${outputPath}`);
}

const program = new Command();

program
    .name("generate-ad")
    .description("ストーリーから広告動画を生成する");

program
    .command("run", { isDefault: true })
    .description("パイプライン全体を実行する")
    .option("-c, --config <path>", "設定ファイル", "config.json")
    .option("-s, --story <path>", "ストーリーファイル (設定より優先)")
    .option("-b, --brand <name>", "表示するブランド名 (設定より優先)")
    .option("--storyboard <path>", "既存の storyboard.json を使い LLM ステップをスキップ")
    .option("--no-color-match", "クリップ間の色合わせを行わない")
    .option("--export-compatible", "互換形式の MP4 も書き出す")
    .option("--continue-on-error", "生成失敗時にプレースホルダーで続行する")
    .option("-v, --verbose", "デバッグログを出力")
    .action(async (opts: RunOptions) => {
        await runPipeline(opts);
    });

program
    .command("convert <input> [output]")
    .description("動画を互換形式 (H.264 Baseline / AAC) に変換する")
    .action(async (input: string, output: string | undefined) => {
        await convertVideo(input, output);
    });

program.parseAsync(process.argv).catch((err: unknown) => {
    if (err instanceof PipelineError) {
        logger.error({ step: err.step, cause: err.cause === undefined ? undefined : errorMessage(err.cause) }, err.message);
    } else {
        logger.error({ err }, errorMessage(err));
    }
    process.exitCode = 1;
});
