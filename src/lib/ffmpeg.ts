/**
 * ffmpeg.ts
 *
 * FFmpeg / ffprobe 実行ラッパー。
 * 実行は CommandRunner 経由 (テストではフェイクに差し替える)。
 */

import { spawn } from "child_process";
import { FfmpegError } from "./errors.js";
import { createLogger } from "./logger.js";

const logger = createLogger("ffmpeg");

export interface CommandResult {
    exitCode: number | null;
    stdout: string;
    stderr: string;
}

export type CommandRunner = (
    command: string,
    args: readonly string[],
    options: { timeoutMs: number }
) => Promise<CommandResult>;

/**
 * spawn で外部コマンドを実行し、stdout / stderr をまとめて返す。
 * タイムアウト時はプロセスを kill し exitCode=null で返す。
 */
export const spawnCommand: CommandRunner = (command, args, options) =>
    new Promise((resolve, reject) => {
        const child = spawn(command, [...args], { windowsHide: true });
        let stdout = "";
        let stderr = "";
        let timedOut = false;

        const timer = setTimeout(() => {
            timedOut = true;
            child.kill("SIGKILL");
        }, options.timeoutMs);

        child.stdout.on("data", (chunk: Buffer) => {
            stdout += chunk.toString();
        });
        child.stderr.on("data", (chunk: Buffer) => {
            stderr += chunk.toString();
        });
        child.on("error", (err) => {
            clearTimeout(timer);
            reject(err);
        });
        child.on("close", (code) => {
            clearTimeout(timer);
            resolve({
                exitCode: timedOut ? null : code,
                stdout,
                stderr: timedOut ? `${stderr}\n(timed out after ${options.timeoutMs}ms)` : stderr,
            });
        });
    });

export interface FfmpegOptions {
    ffmpegPath: string;
    ffprobePath: string;
    timeoutMs: number;
    runner?: CommandRunner;
}

export class Ffmpeg {
    private readonly ffmpegPath: string;
    private readonly ffprobePath: string;
    private readonly timeoutMs: number;
    private readonly runner: CommandRunner;

    constructor(options: FfmpegOptions) {
        this.ffmpegPath = options.ffmpegPath;
        this.ffprobePath = options.ffprobePath;
        this.timeoutMs = options.timeoutMs;
        this.runner = options.runner ?? spawnCommand;
    }

    /**
     * ffmpeg を実行する。出力は常に上書き (-y)。非 0 終了で FfmpegError。
     */
    async run(args: readonly string[]): Promise<CommandResult> {
        const fullArgs = ["-hide_banner", "-y", ...args];
        logger.debug({ args: fullArgs }, "ffmpeg 実行");

        const result = await this.runner(this.ffmpegPath, fullArgs, { timeoutMs: this.timeoutMs });
        if (result.exitCode !== 0) {
            throw new FfmpegError("ffmpeg", result.exitCode, result.stderr);
        }
        return result;
    }

    /**
     * メディアの長さ (秒) を返す。取得できない場合は null。
     */
    async probeDuration(filePath: string): Promise<number | null> {
        const args = [
            "-v", "error",
            "-show_entries", "format=duration",
            "-of", "default=noprint_wrappers=1:nokey=1",
            filePath,
        ];

        try {
            const result = await this.runner(this.ffprobePath, args, { timeoutMs: 10_000 });
            if (result.exitCode !== 0) {
                return null;
            }
            const duration = Number.parseFloat(result.stdout.trim());
            return Number.isFinite(duration) && duration > 0 ? duration : null;
        } catch (err) {
            logger.warn({ filePath, error: err }, "ffprobe の実行に失敗");
            return null;
        }
    }
}

// ============================================================
// フィルタ文字列ユーティリティ
// ============================================================

/**
 * フィルタオプション値のエスケープ。
 * フィルタグラフ解析とオプション解析の 2 段階でアンエスケープされるため、
 * 1) シングルクォートで囲み ' を '\'' に置換
 * 2) グラフ区切り文字 (\ ' [ ] , ;) をバックスラッシュでエスケープ
 */
export function quoteFilterValue(value: string): string {
    const optionLevel = `'${value.replace(/'/g, "'\\''")}'`;
    return optionLevel.replace(/[\\'[\],;]/g, "\\$&");
}

/**
 * フィルタ引数用の数値表記 (小数 3 桁まで、-0 は 0)
 */
export function formatNumber(value: number): string {
    const rounded = Math.round(value * 1000) / 1000;
    return Object.is(rounded, -0) ? "0" : String(rounded);
}
