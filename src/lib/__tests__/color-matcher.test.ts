/**
 * color-matcher.test.ts
 *
 * 色合わせの数値ロジックとフィルタ文字列、FFmpeg 呼び出し順のテスト。
 * signalstats の出力はフェイクの CommandRunner が返す。
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as path from "path";
import {
    ColorMatcher,
    DEFAULT_BASE_FILTER,
    IDENTITY_GRADE,
    buildClipFilter,
    deriveGrade,
    fadeOutStart,
    isIdentityGrade,
    parseSignalstats,
    type ColorStats,
} from "../color-matcher.js";
import { writePlaceholder } from "../utils/media-files.js";
import { createFakeFfmpeg, ffmpegArgs, makeTempDir, removeDir, writeMedia } from "./helpers.js";

vi.mock("../logger.js", () => ({
    createLogger: () => ({
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    }),
}));

type FrameStats = Omit<ColorStats, "frames">;

const REFERENCE: FrameStats = { yavg: 120, ylow: 20, yhigh: 220, uavg: 128, vavg: 128, satavg: 40 };
const DARKER: FrameStats = { yavg: 100, ylow: 30, yhigh: 190, uavg: 120, vavg: 140, satavg: 50 };

function signalstatsLog(frames: FrameStats[]): string {
    return frames
        .map((f, i) =>
            [
                `[Parsed_metadata_2 @ 0x1] frame:${i} pts:${i} pts_time:${i * 0.5}`,
                `[Parsed_metadata_2 @ 0x1] lavfi.signalstats.YMIN=16`,
                `[Parsed_metadata_2 @ 0x1] lavfi.signalstats.YLOW=${f.ylow}`,
                `[Parsed_metadata_2 @ 0x1] lavfi.signalstats.YAVG=${f.yavg}`,
                `[Parsed_metadata_2 @ 0x1] lavfi.signalstats.YHIGH=${f.yhigh}`,
                `[Parsed_metadata_2 @ 0x1] lavfi.signalstats.UAVG=${f.uavg}`,
                `[Parsed_metadata_2 @ 0x1] lavfi.signalstats.VAVG=${f.vavg}`,
                `[Parsed_metadata_2 @ 0x1] lavfi.signalstats.SATAVG=${f.satavg}`,
            ].join("\n"),
        )
        .join("\n");
}

function withFrames(stats: FrameStats): ColorStats {
    return { ...stats, frames: 1 };
}

describe("parseSignalstats", () => {
    it("averages values across frames", () => {
        const stats = parseSignalstats(
            signalstatsLog([REFERENCE, { ...REFERENCE, yavg: 130, satavg: 50 }]),
        );
        expect(stats).toEqual({
            yavg: 125,
            ylow: 20,
            yhigh: 220,
            uavg: 128,
            vavg: 128,
            satavg: 45,
            frames: 2,
        });
    });

    it("returns null when no frame was reported", () => {
        expect(parseSignalstats("Output #0, null, to 'pipe:':\n")).toBeNull();
    });
});

describe("deriveGrade", () => {
    it("moves clip statistics toward the reference", () => {
        expect(deriveGrade(withFrames(DARKER), withFrames(REFERENCE))).toEqual({
            brightness: 0.078,
            contrast: 1.25,
            saturation: 0.8,
            balance: { rm: -0.094, gm: 0.016, bm: 0.063 },
        });
    });

    it("clamps every parameter", () => {
        const clip = withFrames({ yavg: 10, ylow: 50, yhigh: 50, uavg: 150, vavg: 100, satavg: 0 });
        const reference = withFrames({ yavg: 250, ylow: 0, yhigh: 255, uavg: 50, vavg: 200, satavg: 90 });
        expect(deriveGrade(clip, reference)).toEqual({
            brightness: 0.25,
            contrast: 1,
            saturation: 1,
            balance: { rm: 0.3, gm: 0, bm: -0.3 },
        });
    });

    it("clamps contrast and saturation ranges", () => {
        const clip = withFrames({ ...REFERENCE, ylow: 0, yhigh: 250, satavg: 100 });
        const grade = deriveGrade(clip, withFrames(REFERENCE));
        expect(grade.contrast).toBe(0.8);
        expect(grade.saturation).toBe(0.7);
    });

    it("is the identity for identical statistics", () => {
        expect(isIdentityGrade(deriveGrade(withFrames(REFERENCE), withFrames(REFERENCE)))).toBe(true);
    });
});

describe("buildClipFilter", () => {
    it("chains grade, normalization and fade-out", () => {
        const grade = deriveGrade(withFrames(DARKER), withFrames(REFERENCE));
        expect(
            buildClipFilter({ grade, baseFilter: DEFAULT_BASE_FILTER, fadeOutStart: 7.5, fadeSeconds: 0.5 }),
        ).toBe(
            "eq=brightness=0.078:contrast=1.25:saturation=0.8," +
                "colorbalance=rm=-0.094:gm=0.016:bm=0.063," +
                "eq=brightness=0:contrast=1.1:saturation=1.0,curves=preset=lighter," +
                "fade=t=out:st=7.5:d=0.5",
        );
    });

    it("omits the grade for the identity", () => {
        expect(buildClipFilter({ grade: IDENTITY_GRADE, baseFilter: DEFAULT_BASE_FILTER, fadeSeconds: 0.5 })).toBe(
            DEFAULT_BASE_FILTER,
        );
    });

    it("omits colorbalance when only eq changes", () => {
        const grade = { ...IDENTITY_GRADE, brightness: 0.1 };
        expect(buildClipFilter({ grade, baseFilter: "", fadeSeconds: 0.5 })).toBe(
            "eq=brightness=0.1:contrast=1:saturation=1",
        );
    });

    it("falls back to the null filter", () => {
        expect(buildClipFilter({ baseFilter: "", fadeSeconds: 0.5 })).toBe("null");
    });
});

describe("fadeOutStart", () => {
    it("never goes below zero", () => {
        expect(fadeOutStart(8, 0.5)).toBe(7.5);
        expect(fadeOutStart(0.2, 0.5)).toBe(0);
    });
});

describe("ColorMatcher.matchClips", () => {
    let dir: string;

    beforeEach(() => {
        dir = makeTempDir();
    });

    afterEach(() => {
        removeDir(dir);
    });

    function clipPath(n: number): string {
        return path.join(dir, `clip_0${n}.mp4`);
    }

    it("grades usable clips toward the first one and skips placeholders", async () => {
        writeMedia(clipPath(1));
        writePlaceholder(clipPath(2), "video clip 2");
        writeMedia(clipPath(3));

        const { ffmpeg, calls } = createFakeFfmpeg((command, args) => {
            if (command === "ffprobe") return { stdout: "8.000000\n" };
            if (args.some((a) => a.includes("signalstats"))) {
                return { stderr: signalstatsLog([args[3] === clipPath(1) ? REFERENCE : DARKER]) };
            }
            return undefined;
        });

        const matcher = new ColorMatcher({ ffmpeg, outputDir: dir, continueOnError: false });
        const results = await matcher.matchClips([
            { path: clipPath(1), plannedDuration: 8 },
            { path: clipPath(2), plannedDuration: 8 },
            { path: clipPath(3), plannedDuration: 8 },
        ]);

        expect(results).toEqual([path.join(dir, "graded_01.mp4"), clipPath(2), path.join(dir, "graded_03.mp4")]);

        const runs = ffmpegArgs(calls);
        expect(runs).toEqual([
            ["-i", clipPath(1), "-vf", "fps=2,signalstats,metadata=mode=print", "-an", "-f", "null", "-"],
            [
                "-i", clipPath(1),
                "-vf", `${DEFAULT_BASE_FILTER},fade=t=out:st=7.5:d=0.5`,
                "-c:v", "libx264", "-pix_fmt", "yuv420p", "-preset", "medium", "-crf", "18", "-c:a", "copy",
                path.join(dir, "graded_01.mp4"),
            ],
            ["-i", clipPath(3), "-vf", "fps=2,signalstats,metadata=mode=print", "-an", "-f", "null", "-"],
            [
                "-i", clipPath(3),
                "-vf",
                "eq=brightness=0.078:contrast=1.25:saturation=0.8,colorbalance=rm=-0.094:gm=0.016:bm=0.063," +
                    DEFAULT_BASE_FILTER,
                "-c:v", "libx264", "-pix_fmt", "yuv420p", "-preset", "medium", "-crf", "18", "-c:a", "copy",
                path.join(dir, "graded_03.mp4"),
            ],
        ]);
        // 最後のクリップは尺を調べない
        expect(calls.filter((c) => c.command === "ffprobe")).toHaveLength(1);
    });

    it("uses the planned duration when probing fails", async () => {
        writeMedia(clipPath(1));
        writeMedia(clipPath(2));
        const { ffmpeg, calls } = createFakeFfmpeg((command) => (command === "ffprobe" ? { exitCode: 1 } : undefined));

        const matcher = new ColorMatcher({ ffmpeg, outputDir: dir, continueOnError: false });
        await matcher.matchClips([
            { path: clipPath(1), plannedDuration: 9 },
            { path: clipPath(2), plannedDuration: 8 },
        ]);

        // 解析結果なし → ノーマライズ + フェードのみ
        const gradeRun = ffmpegArgs(calls)[1];
        expect(gradeRun[3]).toBe(`${DEFAULT_BASE_FILTER},fade=t=out:st=8.5:d=0.5`);
    });

    it("leaves the fade off the last clip that reaches the video", async () => {
        writeMedia(clipPath(1));
        writeMedia(clipPath(2));
        writePlaceholder(clipPath(3), "video clip 3");
        const { ffmpeg, calls } = createFakeFfmpeg((command) =>
            command === "ffprobe" ? { stdout: "8.000000\n" } : undefined,
        );

        const matcher = new ColorMatcher({ ffmpeg, outputDir: dir, continueOnError: false });
        const results = await matcher.matchClips([
            { path: clipPath(1), plannedDuration: 8 },
            { path: clipPath(2), plannedDuration: 8 },
            { path: clipPath(3), plannedDuration: 8 },
        ]);

        expect(results[2]).toBe(clipPath(3));
        const runs = ffmpegArgs(calls);
        expect(runs).toHaveLength(4);
        expect(runs[1][3]).toBe(`${DEFAULT_BASE_FILTER},fade=t=out:st=7.5:d=0.5`);
        expect(runs[3][3]).toBe(DEFAULT_BASE_FILTER);
        expect(calls.filter((c) => c.command === "ffprobe")).toHaveLength(1);
    });

    it("returns the inputs when every clip is a placeholder", async () => {
        writePlaceholder(clipPath(1), "video clip 1");
        const { ffmpeg, calls } = createFakeFfmpeg();

        const matcher = new ColorMatcher({ ffmpeg, outputDir: dir, continueOnError: false });
        expect(await matcher.matchClips([{ path: clipPath(1), plannedDuration: 8 }])).toEqual([clipPath(1)]);
        expect(calls).toHaveLength(0);
    });

    it("keeps the original clip when grading fails and errors are tolerated", async () => {
        writeMedia(clipPath(1));
        const { ffmpeg } = createFakeFfmpeg((_command, args) =>
            args.includes("libx264") ? { exitCode: 1, stderr: "encoder error" } : undefined,
        );

        const tolerant = new ColorMatcher({ ffmpeg, outputDir: dir, continueOnError: true });
        expect(await tolerant.matchClips([{ path: clipPath(1), plannedDuration: 8 }])).toEqual([clipPath(1)]);

        const strict = new ColorMatcher({ ffmpeg, outputDir: dir, continueOnError: false });
        await expect(strict.matchClips([{ path: clipPath(1), plannedDuration: 8 }])).rejects.toMatchObject({
            step: "color_match",
        });
    });
});
