/**
 * errors.ts
 *
 * パイプライン共通のエラー型。
 * どのステップで失敗したかを `step` に保持し、CLI がまとめて報告する。
 */

export type PipelineStep =
    | "config"
    | "storyboard"
    | "keyframes"
    | "consistency"
    | "clips"
    | "color_match"
    | "audio"
    | "assemble"
    | "text_overlay"
    | "compat_export";

export class PipelineError extends Error {
    readonly step: PipelineStep;

    constructor(step: PipelineStep, message: string, cause?: unknown) {
        super(message);
        this.name = "PipelineError";
        this.step = step;
        if (cause !== undefined) {
            this.cause = cause;
        }
    }
}

export class ConfigError extends PipelineError {
    constructor(message: string, cause?: unknown) {
        super("config", message, cause);
        this.name = "ConfigError";
    }
}

export class StoryboardParseError extends PipelineError {
    /** モデル応答の先頭部分 (診断用) */
    readonly excerpt: string;

    constructor(message: string, rawAnswer: string, cause?: unknown) {
        super("storyboard", message, cause);
        this.name = "StoryboardParseError";
        this.excerpt = rawAnswer.slice(0, 1000);
    }
}

export class ApiError extends Error {
    readonly status: number;
    readonly body: string;

    constructor(message: string, status: number, body: string) {
        super(`${message} (HTTP ${status}): ${body.slice(0, 200)}`);
        this.name = "ApiError";
        this.status = status;
        this.body = body.slice(0, 200);
    }
}

export class TaskFailedError extends Error {
    readonly taskId: string;

    constructor(taskId: string, reason: string) {
        super(`タスク ${taskId} が失敗しました: ${reason}`);
        this.name = "TaskFailedError";
        this.taskId = taskId;
    }
}

export class TaskTimeoutError extends Error {
    readonly taskId: string;
    readonly waitedMs: number;

    constructor(taskId: string, waitedMs: number) {
        super(`タスク ${taskId} がタイムアウトしました (${Math.round(waitedMs / 1000)}秒)`);
        this.name = "TaskTimeoutError";
        this.taskId = taskId;
        this.waitedMs = waitedMs;
    }
}

export class FfmpegError extends Error {
    readonly command: string;
    readonly exitCode: number | null;
    readonly stderr: string;

    constructor(command: string, exitCode: number | null, stderr: string) {
        const detail = stderr.trim().slice(-500);
        super(
            exitCode === null
                ? `${command} が強制終了されました: ${detail}`
                : `${command} が終了コード ${exitCode} で失敗しました: ${detail}`,
        );
        this.name = "FfmpegError";
        this.command = command;
        this.exitCode = exitCode;
        this.stderr = detail;
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
