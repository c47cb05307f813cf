import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { VideoAssembler, buildConcatList } from "../video-assembler.js";
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

describe("buildConcatList", () => {
    it("writes absolute paths and escapes single quotes", () => {
        expect(buildConcatList(["/out/clips/clip_01.mp4", "/out/it's/clip_02.mp4"])).toBe(
            "file '/out/clips/clip_01.mp4'\nfile '/out/it'\\''s/clip_02.mp4'\n",
        );
    });
});

describe("VideoAssembler", () => {
    let dir: string;

    beforeEach(() => {
        dir = makeTempDir();
    });

    afterEach(() => {
        removeDir(dir);
    });

    it("concatenates usable clips with stream copy", async () => {
        const clip1 = path.join(dir, "clip_01.mp4");
        const clip2 = path.join(dir, "clip_02.mp4");
        const clip3 = path.join(dir, "clip_03.mp4");
        writeMedia(clip1);
        writePlaceholder(clip2, "video clip 2");
        writeMedia(clip3);

        const { ffmpeg, calls } = createFakeFfmpeg();
        const assembler = new VideoAssembler({ ffmpeg, workDir: dir, outputDir: dir });

        const merged = await assembler.concatClips([clip1, clip2, clip3]);

        const listPath = path.join(dir, "concat_list.txt");
        expect(merged).toBe(path.join(dir, "merged_video.mp4"));
        expect(fs.readFileSync(listPath, "utf-8")).toBe(`file '${clip1}'\nfile '${clip3}'\n`);
        expect(ffmpegArgs(calls)).toEqual([
            ["-f", "concat", "-safe", "0", "-i", listPath, "-c", "copy", merged],
        ]);
    });

    it("treats placeholders as unusable clips", () => {
        const real = path.join(dir, "clip_01.mp4");
        const placeholder = path.join(dir, "clip_02.mp4");
        writeMedia(real);
        writePlaceholder(placeholder, "video clip 2");
        const { ffmpeg } = createFakeFfmpeg();
        const assembler = new VideoAssembler({ ffmpeg, workDir: dir, outputDir: dir });

        expect(assembler.isUsableClip(real)).toBe(true);
        expect(assembler.isUsableClip(placeholder)).toBe(false);
        expect(assembler.isUsableClip(path.join(dir, "missing.mp4"))).toBe(false);
    });

    it("fails when no clip is usable", async () => {
        const clip = path.join(dir, "clip_01.mp4");
        writePlaceholder(clip, "video clip 1");
        const { ffmpeg } = createFakeFfmpeg();

        await expect(
            new VideoAssembler({ ffmpeg, workDir: dir, outputDir: dir }).concatClips([clip]),
        ).rejects.toMatchObject({
            step: "assemble",
            message: "[VideoAssembler] 連結できるクリップがありません",
        });
    });

    it("muxes audio as AAC and stops at the shorter stream", async () => {
        const { ffmpeg, calls } = createFakeFfmpeg();
        const assembler = new VideoAssembler({ ffmpeg, workDir: dir, outputDir: dir });

        const output = await assembler.addAudio("/v/merged.mp4", "/a/final.mp3");

        expect(output).toBe(path.join(dir, "video_with_audio.mp4"));
        expect(ffmpegArgs(calls)).toEqual([
            ["-i", "/v/merged.mp4", "-i", "/a/final.mp3", "-c:v", "copy", "-c:a", "aac", "-shortest", output],
        ]);
    });

    it("wraps mux failures", async () => {
        const { ffmpeg } = createFakeFfmpeg(() => ({ exitCode: 1, stderr: "bad audio" }));
        const assembler = new VideoAssembler({ ffmpeg, workDir: dir, outputDir: dir });
        await expect(assembler.addAudio("v.mp4", "a.mp3")).rejects.toThrow(
            "[VideoAssembler] 音声の合成に失敗しました: ffmpeg が終了コード 1 で失敗しました: bad audio",
        );
    });
});
