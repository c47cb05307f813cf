/**
 * color-matcher.ts
 *
 * Step 4: クリップ間の色・明るさの統一。
 *
 * 1. 各クリップを signalstats で解析し、輝度 (Y)・色差 (U/V)・彩度の平均を得る
 * 2. 最初の有効なクリップを基準に、eq / colorbalance のパラメータを算出
 * 3. 全クリップに 補正 → 共通ノーマライズ → (最後以外) フェードアウト を 1 パスで適用
 *
 * プレースホルダーはそのまま通す。解析に失敗したクリップはノーマライズのみ。
 *
 * Ad Pipeline — Color Layer
 */

import * as path from "path";
import { createLogger } from "./logger.js";
import { PipelineError, errorMessage } from "./errors.js";
import { formatNumber, type Ffmpeg } from "./ffmpeg.js";
import { isUsableMedia, sceneFileName } from "./utils/media-files.js";

const logger = createLogger("color-matcher");

// ============================================================
// 型定義
// ============================================================

/** signalstats のフレーム平均 (8bit スケール) */
export interface ColorStats {
    yavg: number;
    ylow: number;
    yhigh: number;
    uavg: number;
    vavg: number;
    satavg: number;
    frames: number;
}

export interface ColorBalance {
    rm: number;
    gm: number;
    bm: number;
}

export interface ColorGrade {
    brightness: number;
    contrast: number;
    saturation: number;
    balance: ColorBalance;
}

export interface ClipInput {
    path: string;
    /** ストーリーボード上の尺 (秒)。実尺が取れない場合のフェード位置に使う */
    plannedDuration: number;
}

export const IDENTITY_GRADE: ColorGrade = {
    brightness: 0,
    contrast: 1,
    saturation: 1,
    balance: { rm: 0, gm: 0, bm: 0 },
};

export const DEFAULT_BASE_FILTER =
    "eq=brightness=0:contrast=1.1:saturation=1.0,curves=preset=lighter";

export const DEFAULT_FADE_SECONDS = 0.5;

const LIMITS = {
    brightness: 0.25,
    contrastMin: 0.8,
    contrastMax: 1.3,
    saturationMin: 0.7,
    saturationMax: 1.4,
    balance: 0.3,
} as const;

// ============================================================
// 解析
// ============================================================

const STAT_KEYS = ["YAVG", "YLOW", "YHIGH", "UAVG", "VAVG", "SATAVG"] as const;
type StatKey = (typeof STAT_KEYS)[number];

/**
 * metadata=mode=print の出力から signalstats の値を集計する。
 * フレームが 1 つも無ければ null。
 */
export function parseSignalstats(log: string): ColorStats | null {
    const sums: Record<StatKey, number> = { YAVG: 0, YLOW: 0, YHIGH: 0, UAVG: 0, VAVG: 0, SATAVG: 0 };
    const counts: Record<StatKey, number> = { YAVG: 0, YLOW: 0, YHIGH: 0, UAVG: 0, VAVG: 0, SATAVG: 0 };

    const pattern = /lavfi\.signalstats\.([A-Z]+)=(-?[\d.]+)/g;
    for (const match of log.matchAll(pattern)) {
        const key = match[1];
        if (!isStatKey(key)) continue;
        const value = Number.parseFloat(match[2]);
        if (!Number.isFinite(value)) continue;
        sums[key] += value;
        counts[key] += 1;
    }

    if (counts.YAVG === 0) {
        return null;
    }

    const avg = (key: StatKey, fallback: number): number =>
        counts[key] > 0 ? sums[key] / counts[key] : fallback;

    return {
        yavg: avg("YAVG", 0),
        ylow: avg("YLOW", 16),
        yhigh: avg("YHIGH", 235),
        uavg: avg("UAVG", 128),
        vavg: avg("VAVG", 128),
        satavg: avg("SATAVG", 0),
        frames: counts.YAVG,
    };
}

function isStatKey(value: string): value is StatKey {
    return (STAT_KEYS as readonly string[]).includes(value);
}

// ============================================================
// パラメータ算出
// ============================================================

function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}

function round3(value: number): number {
    const rounded = Math.round(value * 1000) / 1000;
    return Object.is(rounded, -0) ? 0 : rounded;
}

/**
 * clip の統計を reference に近づけるための補正値を求める。
 */
export function deriveGrade(clip: ColorStats, reference: ColorStats): ColorGrade {
    const brightness = clamp((reference.yavg - clip.yavg) / 255, -LIMITS.brightness, LIMITS.brightness);

    const clipRange = clip.yhigh - clip.ylow;
    const refRange = reference.yhigh - reference.ylow;
    const contrast =
        clipRange > 0 && refRange > 0
            ? clamp(refRange / clipRange, LIMITS.contrastMin, LIMITS.contrastMax)
            : 1;

    const saturation =
        clip.satavg > 0
            ? clamp(reference.satavg / clip.satavg, LIMITS.saturationMin, LIMITS.saturationMax)
            : 1;

    // V (Cr) は赤、U (Cb) は青方向。中間調で差分を打ち消し、緑で全体の偏りを戻す
    const rm = clamp((reference.vavg - clip.vavg) / 128, -LIMITS.balance, LIMITS.balance);
    const bm = clamp((reference.uavg - clip.uavg) / 128, -LIMITS.balance, LIMITS.balance);
    const gm = clamp(-(rm + bm) / 2, -LIMITS.balance, LIMITS.balance);

    return {
        brightness: round3(brightness),
        contrast: round3(contrast),
        saturation: round3(saturation),
        balance: { rm: round3(rm), gm: round3(gm), bm: round3(bm) },
    };
}

export function isIdentityGrade(grade: ColorGrade): boolean {
    return (
        grade.brightness === 0 &&
        grade.contrast === 1 &&
        grade.saturation === 1 &&
        grade.balance.rm === 0 &&
        grade.balance.gm === 0 &&
        grade.balance.bm === 0
    );
}

export function buildGradeFilter(grade: ColorGrade): string {
    const eq =
        `eq=brightness=${formatNumber(grade.brightness)}` +
        `:contrast=${formatNumber(grade.contrast)}` +
        `:saturation=${formatNumber(grade.saturation)}`;
    const { rm, gm, bm } = grade.balance;
    if (rm === 0 && gm === 0 && bm === 0) {
        return eq;
    }
    return `${eq},colorbalance=rm=${formatNumber(rm)}:gm=${formatNumber(gm)}:bm=${formatNumber(bm)}`;
}

export interface ClipFilterOptions {
    grade?: ColorGrade;
    baseFilter: string;
    /** フェードアウト開始位置 (秒)。undefined ならフェードなし */
    fadeOutStart?: number;
    fadeSeconds: number;
}

export function buildClipFilter(options: ClipFilterOptions): string {
    const parts: string[] = [];
    if (options.grade && !isIdentityGrade(options.grade)) {
        parts.push(buildGradeFilter(options.grade));
    }
    if (options.baseFilter) {
        parts.push(options.baseFilter);
    }
    if (options.fadeOutStart !== undefined) {
        parts.push(
            `fade=t=out:st=${formatNumber(options.fadeOutStart)}:d=${formatNumber(options.fadeSeconds)}`
        );
    }
    return parts.length > 0 ? parts.join(",") : "null";
}

export function fadeOutStart(durationSec: number, fadeSeconds: number): number {
    return Math.max(0, round3(durationSec - fadeSeconds));
}

// ============================================================
// ColorMatcher
// ============================================================

export interface ColorMatcherOptions {
    ffmpeg: Ffmpeg;
    outputDir: string;
    baseFilter?: string;
    fadeSeconds?: number;
    /** 解析時のサンプリング fps */
    sampleFps?: number;
    continueOnError: boolean;
}

export class ColorMatcher {
    private readonly ffmpeg: Ffmpeg;
    private readonly outputDir: string;
    private readonly baseFilter: string;
    private readonly fadeSeconds: number;
    private readonly sampleFps: number;
    private readonly continueOnError: boolean;

    constructor(options: ColorMatcherOptions) {
        this.ffmpeg = options.ffmpeg;
        this.outputDir = options.outputDir;
        this.baseFilter = options.baseFilter ?? DEFAULT_BASE_FILTER;
        this.fadeSeconds = options.fadeSeconds ?? DEFAULT_FADE_SECONDS;
        this.sampleFps = options.sampleFps ?? 2;
        this.continueOnError = options.continueOnError;
    }

    async analyzeClip(clipPath: string): Promise<ColorStats | null> {
        try {
            const result = await this.ffmpeg.run([
                "-i", clipPath,
                "-vf", `fps=${this.sampleFps},signalstats,metadata=mode=print`,
                "-an",
                "-f", "null",
                "-",
            ]);
            return parseSignalstats(`${result.stdout}\n${result.stderr}`);
        } catch (err) {
            logger.warn({ clipPath, error: errorMessage(err) }, "色解析に失敗");
            return null;
        }
    }

    async matchClips(clips: readonly ClipInput[]): Promise<string[]> {
        const usable = clips.map((clip) => isUsableMedia(clip.path));
        const referenceIndex = usable.indexOf(true);
        const lastUsableIndex = usable.lastIndexOf(true);

        if (referenceIndex === -1) {
            logger.warn("有効なクリップがありません。色合わせをスキップ");
            return clips.map((clip) => clip.path);
        }

        const reference = await this.analyzeClip(clips[referenceIndex].path);
        logger.info(
            { scene: referenceIndex + 1, stats: reference },
            "基準クリップを解析",
        );

        const results: string[] = [];
        for (let i = 0; i < clips.length; i++) {
            const clip = clips[i];
            if (!usable[i]) {
                logger.info({ scene: i + 1 }, "プレースホルダーのためスキップ");
                results.push(clip.path);
                continue;
            }

            const stats = i === referenceIndex ? reference : await this.analyzeClip(clip.path);
            const grade = stats && reference ? deriveGrade(stats, reference) : undefined;
            const isLast = i === lastUsableIndex;

            results.push(await this.gradeClip(clip, i + 1, grade, isLast));
        }

        logger.info({ count: results.length }, "色合わせ完了");
        return results;
    }

    private async gradeClip(
        clip: ClipInput,
        sceneNumber: number,
        grade: ColorGrade | undefined,
        isLast: boolean,
    ): Promise<string> {
        const outputPath = path.join(this.outputDir, sceneFileName("graded", sceneNumber, ".mp4"));

        let fadeStart: number | undefined;
        if (!isLast) {
            const duration = (await this.ffmpeg.probeDuration(clip.path)) ?? clip.plannedDuration;
            fadeStart = fadeOutStart(duration, this.fadeSeconds);
        }

        const filter = buildClipFilter({
            grade,
            baseFilter: this.baseFilter,
            fadeOutStart: fadeStart,
            fadeSeconds: this.fadeSeconds,
        });

        logger.info({ scene: sceneNumber, filter }, "補正フィルタ適用");

        try {
            await this.ffmpeg.run([
                "-i", clip.path,
                "-vf", filter,
                "-c:v", "libx264",
                "-pix_fmt", "yuv420p",
                "-preset", "medium",
                "-crf", "18",
                "-c:a", "copy",
                outputPath,
            ]);
            return outputPath;
        } catch (err) {
            if (!this.continueOnError) {
                throw new PipelineError(
                    "color_match",
                    `[ColorMatcher] シーン ${sceneNumber} の色補正に失敗しました: ${errorMessage(err)}`,
                    err,
                );
            }
            logger.warn({ scene: sceneNumber, error: errorMessage(err) }, "色補正に失敗。元のクリップを使用");
            return clip.path;
        }
    }
}
