/**
 * text-overlay.ts
 *
 * Step 7: 動画の最後にブランド名を表示する (drawtext)。
 * 表示区間の前後 1 秒で alpha をフェードさせる。
 */

import * as path from "path";
import { createLogger } from "./logger.js";
import { PipelineError, errorMessage } from "./errors.js";
import { formatNumber, quoteFilterValue, type Ffmpeg } from "./ffmpeg.js";

const logger = createLogger("text-overlay");

export const TEXT_OVERLAY_FILE = "final_with_text.mp4";
export const DEFAULT_DISPLAY_SECONDS = 5;

/** alpha: 開始前 0 → 1 秒でフェードイン → 表示 → 最後の 1 秒でフェードアウト */
export function buildAlphaExpression(start: number, duration: number): string {
    const s = formatNumber(start);
    const fadeInEnd = formatNumber(start + 1);
    const holdEnd = formatNumber(start + duration - 1);
    const end = formatNumber(start + duration);
    return `if(lt(t,${s}),0,if(lt(t,${fadeInEnd}),(t-${s})/1,if(lt(t,${holdEnd}),1,(${end}-t)/1)))`;
}

export interface DrawtextOptions {
    text: string;
    start: number;
    duration: number;
    fontFile?: string;
}

export function buildDrawtextFilter(options: DrawtextOptions): string {
    const params = [
        `text=${quoteFilterValue(options.text)}`,
        "expansion=none",
    ];
    if (options.fontFile) {
        params.push(`fontfile=${quoteFilterValue(options.fontFile)}`);
    }
    params.push(
        "fontsize=90",
        "fontcolor=white",
        "x=(w-text_w)/2",
        "y=(h-text_h)/2",
        `alpha=${quoteFilterValue(buildAlphaExpression(options.start, options.duration))}`,
        "shadowcolor=black@0.8",
        "shadowx=4",
        "shadowy=4",
    );
    return `drawtext=${params.join(":")}`;
}

export interface TextOverlayOptions {
    ffmpeg: Ffmpeg;
    fontFile?: string;
    displaySeconds?: number;
}

export interface AddBrandTextRequest {
    videoPath: string;
    brandName: string;
    /** 実尺が取れない場合に使う尺 (ストーリーボード合計) */
    fallbackDuration: number;
}

export class TextOverlay {
    private readonly ffmpeg: Ffmpeg;
    private readonly fontFile?: string;
    private readonly displaySeconds: number;

    constructor(options: TextOverlayOptions) {
        this.ffmpeg = options.ffmpeg;
        this.fontFile = options.fontFile;
        this.displaySeconds = options.displaySeconds ?? DEFAULT_DISPLAY_SECONDS;
    }

    async addBrandText(request: AddBrandTextRequest): Promise<string> {
        const outputPath = path.join(path.dirname(request.videoPath), TEXT_OVERLAY_FILE);
        const total = (await this.ffmpeg.probeDuration(request.videoPath)) ?? request.fallbackDuration;
        const start = Math.max(0, total - this.displaySeconds);

        const filter = buildDrawtextFilter({
            text: request.brandName,
            start,
            duration: this.displaySeconds,
            fontFile: this.fontFile,
        });

        logger.info(
            { brandName: request.brandName, startSec: start, endSec: start + this.displaySeconds },
            "ブランドテキストを追加",
        );

        try {
            await this.ffmpeg.run(["-i", request.videoPath, "-vf", filter, "-codec:a", "copy", outputPath]);
        } catch (err) {
            throw new PipelineError(
                "text_overlay",
                `[TextOverlay] テキストの追加に失敗しました: ${errorMessage(err)}`,
                err,
            );
        }
        return outputPath;
    }
}
