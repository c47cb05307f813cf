/**
 * config.ts
 *
 * config.json + 環境変数からパイプライン設定を組み立てる。
 * ファイルは snake_case (api_keys / brand_name ...)、内部では camelCase の AppConfig を使う。
 * API キーはファイル優先、未設定なら環境変数で補完する。
 *
 * Ad Pipeline — Configuration Layer
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

// ============================================================
// Zod スキーマ
// ============================================================

const StoryboardProviderSchema = z.enum(["anthropic", "gemini"]);
export type StoryboardProvider = z.infer<typeof StoryboardProviderSchema>;

// 空文字・空白のみのキーは未設定扱い (環境変数で補完する)
const ApiKeySchema = z
    .string()
    .nullable()
    .optional()
    .transform((value) => (value && value.trim().length > 0 ? value : undefined));

const ApiKeysSchema = z
    .object({
        claude_api_key: ApiKeySchema,
        byteplus_api_key: ApiKeySchema,
        gemini_api_key: ApiKeySchema,
    })
    .default({});

export const ConfigFileSchema = z.object({
    api_keys: ApiKeysSchema,
    brand_name: z.string().min(1, "brand_name は空にできません").default("HAHA HEADPHONE"),
    story_path: z.string().min(1).default("story.txt"),
    output_dir: z.string().min(1).default("output"),
    storyboard_provider: StoryboardProviderSchema.default("anthropic"),
    scene_count: z.number().int().min(1).max(12).default(7),
    color_match: z.boolean().default(true),
    image_consistency: z.boolean().default(false),
    export_compatible: z.boolean().default(false),
    continue_on_error: z.boolean().default(false),
    font_file: z.string().min(1).optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================
// AppConfig
// ============================================================

export interface ArkSettings {
    apiKey?: string;
    baseUrl: string;
    imageModel: string;
    editModel: string;
    videoModel: string;
    imageSize: string;
    videoRatio: string;
    videoResolution: string;
    fps: number;
    pollIntervalMs: number;
    maxPollAttempts: number;
    imageDelayMs: number;
    clipDelayMs: number;
}

export interface StoryboardSettings {
    provider: StoryboardProvider;
    sceneCount: number;
    anthropicApiKey?: string;
    anthropicModel: string;
    geminiApiKey?: string;
    geminiModel: string;
    maxTokens: number;
}

export interface FfmpegSettings {
    ffmpegPath: string;
    ffprobePath: string;
    timeoutMs: number;
}

export interface AppConfig {
    brandName: string;
    storyPath: string;
    outputDir: string;
    storyboard: StoryboardSettings;
    ark: ArkSettings;
    ffmpeg: FfmpegSettings;
    colorMatch: boolean;
    imageConsistency: boolean;
    exportCompatible: boolean;
    continueOnError: boolean;
    fontFile?: string;
}

export const ARK_BASE_URL = "https://ark.ap-southeast.bytepluses.com/api/v3";

const DEFAULT_FFMPEG_TIMEOUT_MS = 10 * 60 * 1000;

export function resolveConfig(
    file: ConfigFile,
    env: NodeJS.ProcessEnv = process.env,
): AppConfig {
    return {
        brandName: file.brand_name,
        storyPath: file.story_path,
        outputDir: file.output_dir,
        storyboard: {
            provider: file.storyboard_provider,
            sceneCount: file.scene_count,
            anthropicApiKey: file.api_keys.claude_api_key ?? nonEmpty(env.ANTHROPIC_API_KEY),
            anthropicModel: "claude-sonnet-4-20250514",
            geminiApiKey: file.api_keys.gemini_api_key ?? nonEmpty(env.GEMINI_API_KEY),
            geminiModel: "gemini-2.5-flash",
            maxTokens: 4000,
        },
        ark: {
            apiKey: file.api_keys.byteplus_api_key ?? nonEmpty(env.BYTEPLUS_API_KEY),
            baseUrl: ARK_BASE_URL,
            imageModel: "seedream-4-0-250828",
            editModel: "seededit-1-0-250828",
            videoModel: "seedance-1-0-lite-i2v-250428",
            imageSize: "1920x1080",
            videoRatio: "16:9",
            videoResolution: "720p",
            fps: 24,
            pollIntervalMs: 10_000,
            maxPollAttempts: 60,
            imageDelayMs: 3_000,
            clipDelayMs: 2_000,
        },
        ffmpeg: {
            ffmpegPath: nonEmpty(env.FFMPEG_PATH) ?? "ffmpeg",
            ffprobePath: nonEmpty(env.FFPROBE_PATH) ?? "ffprobe",
            timeoutMs: DEFAULT_FFMPEG_TIMEOUT_MS,
        },
        colorMatch: file.color_match,
        imageConsistency: file.image_consistency,
        exportCompatible: file.export_compatible,
        continueOnError: file.continue_on_error,
        fontFile: file.font_file,
    };
}

/**
 * config.json を読み込み、検証済みの AppConfig を返す。
 */
export function loadConfig(
    configPath: string,
    env: NodeJS.ProcessEnv = process.env,
): AppConfig {
    const absPath = path.resolve(configPath);

    if (!fs.existsSync(absPath)) {
        throw new ConfigError(`[config] 設定ファイルが見つかりません: ${absPath}`);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(absPath, "utf-8"));
    } catch (err) {
        throw new ConfigError(`[config] 設定ファイルの JSON が不正です: ${absPath}`, err);
    }

    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
            .join("; ");
        throw new ConfigError(`[config] 設定ファイルの検証に失敗しました: ${issues}`, parsed.error);
    }

    return resolveConfig(parsed.data, env);
}

/**
 * 選択中のプロバイダーに必要な API キーが揃っているか確認する。
 * 既存の storyboard.json を使う場合はストーリーボード用のキーは不要。
 */
export function assertApiKeys(
    config: AppConfig,
    options?: { storyboardWriter?: boolean },
): void {
    const needsWriter = options?.storyboardWriter ?? true;
    const missing: string[] = [];

    if (!config.ark.apiKey) {
        missing.push("byteplus_api_key (BYTEPLUS_API_KEY)");
    }
    if (needsWriter && config.storyboard.provider === "anthropic" && !config.storyboard.anthropicApiKey) {
        missing.push("claude_api_key (ANTHROPIC_API_KEY)");
    }
    if (needsWriter && config.storyboard.provider === "gemini" && !config.storyboard.geminiApiKey) {
        missing.push("gemini_api_key (GEMINI_API_KEY)");
    }

    if (missing.length > 0) {
        throw new ConfigError(`[config] API キーが設定されていません: ${missing.join(", ")}`);
    }
}

function nonEmpty(value: string | undefined): string | undefined {
    return value && value.trim().length > 0 ? value : undefined;
}
