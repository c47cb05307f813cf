/**
 * ark-client.ts
 *
 * BytePlus ModelArk REST API の薄いクライアント。
 * Bearer 認証の JSON POST/GET、レスポンスの Zod 検証、成果物のダウンロードを担当。
 * リトライは行わない (失敗はそのまま呼び出し元へ)。
 *
 * @see https://docs.byteplus.com/en/docs/ModelArk
 */

import type { z } from "zod";
import { ApiError } from "./errors.js";

export interface ArkClientOptions {
    apiKey: string;
    baseUrl: string;
}

export interface ArkJsonResponse<T> {
    ok: boolean;
    status: number;
    data?: T;
    body: string;
}

export class ArkClient {
    private readonly apiKey: string;
    private readonly baseUrl: string;

    constructor(options: ArkClientOptions) {
        if (!options.apiKey) {
            throw new Error("[ArkClient] BYTEPLUS_API_KEY が設定されていません。");
        }
        this.apiKey = options.apiKey;
        this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    }

    url(endpoint: string): string {
        return `${this.baseUrl}/${endpoint.replace(/^\/+/, "")}`;
    }

    /**
     * JSON を POST し、200 以外は ApiError を投げる。
     */
    async postJson<S extends z.ZodTypeAny>(
        endpoint: string,
        payload: unknown,
        schema: S,
        timeoutMs: number,
    ): Promise<z.infer<S>> {
        const res = await fetch(this.url(endpoint), {
            method: "POST",
            headers: this.headers(),
            body: JSON.stringify(payload),
            signal: AbortSignal.timeout(timeoutMs),
        });

        const body = await res.text();
        if (res.status !== 200) {
            throw new ApiError(`[ArkClient] POST ${endpoint} が失敗しました`, res.status, body);
        }

        return this.parseBody(endpoint, body, schema, res.status);
    }

    /**
     * GET してステータスと検証済みボディを返す。
     * 200 以外でも例外にはせず、呼び出し元 (ポーリング) が判断する。
     */
    async getJson<S extends z.ZodTypeAny>(
        endpoint: string,
        schema: S,
        timeoutMs: number,
    ): Promise<ArkJsonResponse<z.infer<S>>> {
        const res = await fetch(this.url(endpoint), {
            method: "GET",
            headers: this.headers(),
            signal: AbortSignal.timeout(timeoutMs),
        });

        const body = await res.text();
        if (res.status !== 200) {
            return { ok: false, status: res.status, body };
        }

        return {
            ok: true,
            status: res.status,
            data: this.parseBody(endpoint, body, schema, res.status),
            body,
        };
    }

    async download(url: string, timeoutMs: number): Promise<Buffer> {
        const res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
        if (!res.ok) {
            throw new ApiError("[ArkClient] ダウンロードに失敗しました", res.status, await res.text());
        }
        return Buffer.from(await res.arrayBuffer());
    }

    private headers(): Record<string, string> {
        return {
            Authorization: `Bearer ${this.apiKey}`,
            "Content-Type": "application/json",
        };
    }

    private parseBody<S extends z.ZodTypeAny>(
        endpoint: string,
        body: string,
        schema: S,
        status: number,
    ): z.infer<S> {
        let json: unknown;
        try {
            json = JSON.parse(body);
        } catch {
            throw new ApiError(`[ArkClient] ${endpoint} のレスポンスが JSON ではありません`, status, body);
        }

        const parsed = schema.safeParse(json);
        if (!parsed.success) {
            throw new ApiError(`[ArkClient] ${endpoint} のレスポンス形式が不正です`, status, body);
        }
        return parsed.data;
    }
}
