/**
 * helpers.ts
 *
 * テスト共通のフェイク / フィクスチャ。
 * FFmpeg は実行せず、呼び出された引数を記録するだけの CommandRunner を使う。
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { Ffmpeg, type CommandResult, type CommandRunner } from "../ffmpeg.js";
import type { Scene } from "../storyboard.js";

export interface RecordedCall {
    command: string;
    args: string[];
}

export type FakeResponder = (command: string, args: string[]) => Partial<CommandResult> | undefined;

export function createFakeRunner(respond?: FakeResponder): {
    runner: CommandRunner;
    calls: RecordedCall[];
} {
    const calls: RecordedCall[] = [];
    const runner: CommandRunner = async (command, args) => {
        const copied = [...args];
        calls.push({ command, args: copied });
        return { exitCode: 0, stdout: "", stderr: "", ...respond?.(command, copied) };
    };
    return { runner, calls };
}

export function createFakeFfmpeg(respond?: FakeResponder): {
    ffmpeg: Ffmpeg;
    calls: RecordedCall[];
} {
    const { runner, calls } = createFakeRunner(respond);
    const ffmpeg = new Ffmpeg({ ffmpegPath: "ffmpeg", ffprobePath: "ffprobe", timeoutMs: 1000, runner });
    return { ffmpeg, calls };
}

/** ffmpeg 呼び出しだけを取り出し、先頭の -hide_banner -y を除いた引数を返す */
export function ffmpegArgs(calls: readonly RecordedCall[]): string[][] {
    return calls.filter((c) => c.command === "ffmpeg").map((c) => c.args.slice(2));
}

export function makeTempDir(prefix = "ad-pipeline-"): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

/** プレースホルダー判定を超えるサイズのダミーメディア */
export function writeMedia(filePath: string, bytes = 2048): void {
    fs.writeFileSync(filePath, Buffer.alloc(bytes, 7));
}

export function makeScene(overrides?: Partial<Scene>): Scene {
    return {
        scene_number: 1,
        duration: 8,
        visual_description: "A young woman in a busy cafe",
        action: "She looks around, annoyed by the noise",
        dialogue: "",
        camera_angle: "medium shot",
        audio_type: "cafe",
        ...overrides,
    };
}
