import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as path from "path";
import { AudioGenerator, buildCueArgs, cuesFromScenes } from "../audio-generator.js";
import { createFakeFfmpeg, ffmpegArgs, makeScene, makeTempDir, removeDir } from "./helpers.js";

vi.mock("../logger.js", () => ({
    createLogger: () => ({
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    }),
}));

describe("buildCueArgs", () => {
    it("synthesizes cafe ambience from brown noise", () => {
        expect(buildCueArgs("cafe", 8, "cafe.mp3")).toEqual([
            "-f", "lavfi", "-i", "anoisesrc=d=8:c=brown:r=44100:a=0.3",
            "-af", "highpass=f=200,lowpass=f=3000,volume=0.4",
            "cafe.mp3",
        ]);
    });

    it("mixes three sines for calm music", () => {
        expect(buildCueArgs("calm", 9.5, "calm.mp3")).toEqual([
            "-f", "lavfi", "-i", "sine=frequency=440:duration=9.5",
            "-f", "lavfi", "-i", "sine=frequency=523:duration=9.5",
            "-f", "lavfi", "-i", "sine=frequency=659:duration=9.5",
            "-filter_complex",
            "[0:a][1:a][2:a]amix=inputs=3:duration=longest:dropout_transition=2,volume=0.2,lowpass=f=2000",
            "calm.mp3",
        ]);
    });

    it("mixes two higher sines for the product cue", () => {
        expect(buildCueArgs("product", 8, "product.mp3")).toEqual([
            "-f", "lavfi", "-i", "sine=frequency=880:duration=8",
            "-f", "lavfi", "-i", "sine=frequency=1046:duration=8",
            "-filter_complex", "[0:a][1:a]amix=inputs=2:duration=longest,volume=0.3,highpass=f=500",
            "product.mp3",
        ]);
    });
});

describe("cuesFromScenes", () => {
    it("maps scene audio types and durations", () => {
        expect(cuesFromScenes([makeScene({ scene_number: 4, audio_type: "product", duration: 10 })])).toEqual([
            { sceneNumber: 4, type: "product", duration: 10 },
        ]);
    });
});

describe("AudioGenerator", () => {
    let dir: string;

    beforeEach(() => {
        dir = makeTempDir();
    });

    afterEach(() => {
        removeDir(dir);
    });

    it("generates one cue per scene, concatenates and fades", async () => {
        const { ffmpeg, calls } = createFakeFfmpeg((command) =>
            command === "ffprobe" ? { stdout: "25.000\n" } : undefined,
        );
        const generator = new AudioGenerator({ ffmpeg, outputDir: dir });

        const audioPath = await generator.createTimeline([
            makeScene({ scene_number: 1, audio_type: "cafe", duration: 8 }),
            makeScene({ scene_number: 2, audio_type: "calm", duration: 9 }),
            makeScene({ scene_number: 3, audio_type: "product", duration: 8 }),
        ]);

        const cafe = path.join(dir, "scene_01_cafe.mp3");
        const calm = path.join(dir, "scene_02_calm.mp3");
        const product = path.join(dir, "scene_03_product.mp3");
        const merged = path.join(dir, "final_audio.mp3");
        const faded = path.join(dir, "final_audio_faded.mp3");

        expect(audioPath).toBe(faded);
        const runs = ffmpegArgs(calls);
        expect(runs.map((args) => args[args.length - 1])).toEqual([cafe, calm, product, merged, faded]);
        expect(runs[3]).toEqual([
            "-i", cafe, "-i", calm, "-i", product,
            "-filter_complex", "concat=n=3:v=0:a=1[out]",
            "-map", "[out]",
            merged,
        ]);
        expect(runs[4]).toEqual([
            "-i", merged,
            "-af", "afade=t=in:st=0:d=1,afade=t=out:st=23:d=2",
            faded,
        ]);
    });

    it("uses a single cue directly and falls back to the timeline length", async () => {
        const { ffmpeg, calls } = createFakeFfmpeg((command) =>
            command === "ffprobe" ? { exitCode: 1 } : undefined,
        );
        const generator = new AudioGenerator({ ffmpeg, outputDir: dir });

        await generator.createTimeline([makeScene({ audio_type: "calm", duration: 8 })]);

        const runs = ffmpegArgs(calls);
        expect(runs).toHaveLength(2);
        expect(runs[1]).toEqual([
            "-i", path.join(dir, "scene_01_calm.mp3"),
            "-af", "afade=t=in:st=0:d=1,afade=t=out:st=6:d=2",
            path.join(dir, "final_audio_faded.mp3"),
        ]);
    });

    it("returns the unfaded audio when the fade fails", async () => {
        const { ffmpeg } = createFakeFfmpeg((command, args) =>
            command === "ffmpeg" && args.includes("-af") && args.some((a) => a.startsWith("afade"))
                ? { exitCode: 1, stderr: "fade failed" }
                : undefined,
        );
        const generator = new AudioGenerator({ ffmpeg, outputDir: dir });

        const audioPath = await generator.createTimeline([
            makeScene({ scene_number: 1, duration: 8 }),
            makeScene({ scene_number: 2, duration: 8 }),
        ]);
        expect(audioPath).toBe(path.join(dir, "final_audio.mp3"));
    });

    it("throws an audio PipelineError when a cue cannot be synthesized", async () => {
        const { ffmpeg } = createFakeFfmpeg(() => ({ exitCode: 1, stderr: "Unknown filter anoisesrc" }));
        const generator = new AudioGenerator({ ffmpeg, outputDir: dir });

        await expect(generator.createTimeline([makeScene()])).rejects.toMatchObject({
            step: "audio",
            message: "[AudioGenerator] シーン 1 の音声生成に失敗しました: ffmpeg が終了コード 1 で失敗しました: Unknown filter anoisesrc",
        });
    });

    it("rejects an empty scene list", async () => {
        const { ffmpeg } = createFakeFfmpeg();
        await expect(new AudioGenerator({ ffmpeg, outputDir: dir }).createTimeline([])).rejects.toThrow(
            "[AudioGenerator] シーンがありません",
        );
    });
});
