/**
 * seededit-client.ts
 *
 * Seededit (BytePlus) 画像編集クライアント。
 * 既存のキーフレームに編集指示を与え、参照画像とスタイル・人物を揃える。
 */

import { z } from "zod";
import type { ArkClient } from "./ark-client.js";
import { IMAGE_GENERATIONS_ENDPOINT } from "./seedream-client.js";
import { toPngDataUrl } from "./utils/media-files.js";

const EditResponseSchema = z.object({
    data: z.array(z.object({ url: z.string().url().optional() }).passthrough()).default([]),
}).passthrough();

export interface EditImageRequest {
    image: Buffer;
    prompt: string;
    referenceImage?: Buffer;
}

export class SeededitClient {
    constructor(
        private readonly ark: ArkClient,
        private readonly options: { model: string; size: string; timeoutMs?: number },
    ) {}

    buildPayload(request: EditImageRequest): Record<string, unknown> {
        const payload: Record<string, unknown> = {
            model: this.options.model,
            prompt: request.prompt,
            image: toPngDataUrl(request.image),
            size: this.options.size,
            response_format: "url",
            watermark: false,
        };
        if (request.referenceImage) {
            payload.reference_image = toPngDataUrl(request.referenceImage);
        }
        return payload;
    }

    async edit(request: EditImageRequest): Promise<Buffer> {
        const timeoutMs = this.options.timeoutMs ?? 120_000;
        const result = await this.ark.postJson(
            IMAGE_GENERATIONS_ENDPOINT,
            this.buildPayload(request),
            EditResponseSchema,
            timeoutMs,
        );

        const editedUrl = result.data[0]?.url;
        if (!editedUrl) {
            throw new Error("[SeededitClient] レスポンスに編集済み画像の URL が含まれていません");
        }
        return this.ark.download(editedUrl, 60_000);
    }
}
