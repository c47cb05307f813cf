/**
 * seedance-client.ts
 *
 * Seedance (BytePlus) 画像 → 動画生成クライアント。
 * タスクを作成し、固定間隔でステータスをポーリングして完成した動画をダウンロードする。
 *
 * ステータス遷移: queued → running → succeeded | failed
 */

import { z } from "zod";
import type { ArkClient } from "./ark-client.js";
import { TaskFailedError, TaskTimeoutError } from "./errors.js";
import { createLogger } from "./logger.js";
import { sleep } from "./utils/sleep.js";
import { toPngDataUrl } from "./utils/media-files.js";

const logger = createLogger("seedance-client");

export const TASKS_ENDPOINT = "contents/generations/tasks";

/** Seedance Lite の 1 クリップあたりの上限秒数 */
export const MAX_CLIP_SECONDS = 10;
export const MIN_CLIP_SECONDS = 1;

/**
 * シーン尺から実際に生成されるクリップ尺 (秒) を求める。
 * --duration は整数秒のみ受け付けるため丸めたうえで 1〜10 秒に収める。
 */
export function clipDurationFor(sceneDurationSec: number): number {
    return Math.min(Math.max(Math.round(sceneDurationSec), MIN_CLIP_SECONDS), MAX_CLIP_SECONDS);
}

const CreateTaskResponseSchema = z.object({
    id: z.string().min(1).optional(),
}).passthrough();

const TaskStatusResponseSchema = z.object({
    id: z.string().optional(),
    status: z.string().optional(),
    content: z.object({ video_url: z.string().optional() }).passthrough().optional(),
    error: z.object({ message: z.string().optional() }).passthrough().nullable().optional(),
}).passthrough();

export type TaskStatus = "queued" | "running" | "succeeded" | "failed";

export interface SeedanceOptions {
    model: string;
    ratio: string;
    resolution: string;
    fps: number;
    pollIntervalMs: number;
    maxPollAttempts: number;
    createTimeoutMs?: number;
    statusTimeoutMs?: number;
    downloadTimeoutMs?: number;
}

export type SeedanceProgressCallback = (
    status: string,
    attempt: number,
    maxAttempts: number
) => void;

export class SeedanceClient {
    private readonly ark: ArkClient;
    private readonly options: SeedanceOptions;

    constructor(ark: ArkClient, options: SeedanceOptions) {
        this.ark = ark;
        this.options = options;
    }

    /**
     * モーションプロンプトに Seedance のパラメータ指定を付け足す
     */
    buildMotionCommand(motionPrompt: string, durationSec: number): string {
        const duration = clipDurationFor(durationSec);
        const { ratio, resolution, fps } = this.options;
        return `${motionPrompt} --duration ${duration} --ratio ${ratio} --resolution ${resolution} --fps ${fps} --watermark false`;
    }

    buildTaskPayload(image: Buffer, text: string): Record<string, unknown> {
        return {
            model: this.options.model,
            content: [
                {
                    type: "image_url",
                    image_url: { url: toPngDataUrl(image) },
                    role: "first_frame",
                },
                {
                    type: "text",
                    text,
                },
            ],
        };
    }

    async createTask(image: Buffer, text: string): Promise<string> {
        const result = await this.ark.postJson(
            TASKS_ENDPOINT,
            this.buildTaskPayload(image, text),
            CreateTaskResponseSchema,
            this.options.createTimeoutMs ?? 60_000,
        );

        if (!result.id) {
            throw new Error("[SeedanceClient] タスク ID が返されませんでした");
        }
        return result.id;
    }

    /**
     * タスク完了まで待ち、動画の URL を返す。
     */
    async waitForVideo(
        taskId: string,
        onProgress?: SeedanceProgressCallback,
        signal?: AbortSignal
    ): Promise<string> {
        const { pollIntervalMs, maxPollAttempts } = this.options;

        for (let attempt = 1; attempt <= maxPollAttempts; attempt++) {
            await sleep(pollIntervalMs, signal);

            const res = await this.ark.getJson(
                `${TASKS_ENDPOINT}/${encodeURIComponent(taskId)}`,
                TaskStatusResponseSchema,
                this.options.statusTimeoutMs ?? 30_000,
            );

            if (!res.ok || !res.data) {
                logger.warn({ taskId, status: res.status, attempt }, "ステータス取得に失敗。ポーリングを継続");
                continue;
            }

            const status = res.data.status ?? "unknown";
            onProgress?.(status, attempt, maxPollAttempts);
            logger.debug({ taskId, status, attempt, maxPollAttempts }, "タスクステータス");

            if (status === "succeeded") {
                const videoUrl = res.data.content?.video_url;
                if (!videoUrl) {
                    throw new TaskFailedError(taskId, "成功レスポンスに video_url がありません");
                }
                return videoUrl;
            }

            if (status === "failed") {
                throw new TaskFailedError(taskId, res.data.error?.message ?? "Unknown error");
            }

            if (status !== "queued" && status !== "running") {
                logger.warn({ taskId, status }, "不明なステータス");
            }
        }

        throw new TaskTimeoutError(taskId, pollIntervalMs * maxPollAttempts);
    }

    /**
     * 画像 1 枚から動画を生成し、MP4 のバイト列を返す。
     */
    async generate(
        image: Buffer,
        motionPrompt: string,
        durationSec: number,
        onProgress?: SeedanceProgressCallback
    ): Promise<Buffer> {
        const taskId = await this.createTask(image, this.buildMotionCommand(motionPrompt, durationSec));
        logger.info({ taskId }, "動画生成タスクを作成");

        const videoUrl = await this.waitForVideo(taskId, onProgress);
        return this.ark.download(videoUrl, this.options.downloadTimeoutMs ?? 120_000);
    }
}
