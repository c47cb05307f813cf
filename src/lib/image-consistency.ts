/**
 * image-consistency.ts
 *
 * キーフレームの一貫性補正 (任意ステップ)。
 * シーン記述から編集項目を洗い出し、Seededit で 1 枚目に合わせて編集する。
 *
 * 編集項目:
 * - enhance         : 1 枚目 (参照) の人物・服装・背景を明確化
 * - remove_object   : ヘッドホン装着シーンで余分なヘッドホンを除去
 * - match_style     : 背景・ライティング・色調を 1 枚目に合わせる
 * - match_character : 人物の外見・服装を参照画像に合わせる
 * - product_focus   : 最終シーンの製品クローズアップ
 */

import * as fs from "fs";
import { createLogger } from "./logger.js";
import { PipelineError, errorMessage } from "./errors.js";
import type { Scene } from "./storyboard.js";
import type { SeededitClient } from "./seededit-client.js";
import { sleep } from "./utils/sleep.js";
import { isUsableMedia } from "./utils/media-files.js";

const logger = createLogger("image-consistency");

export type EditType =
    | "enhance"
    | "remove_object"
    | "match_style"
    | "match_character"
    | "product_focus";

export interface EditItem {
    type: EditType;
    description: string;
}

export interface ConsistencyPlan {
    sceneNumber: number;
    imagePath: string;
    isReference: boolean;
    edits: EditItem[];
}

const EDIT_DESCRIPTIONS: Record<EditType, string> = {
    enhance:
        "Ensure clear character appearance, clothing, and environment details as reference",
    remove_object:
        "Remove extra headphones from table or other locations, keep only worn headphones",
    match_style: "Match background style, lighting, and color tone of first frame",
    match_character: "Ensure character appearance and clothing match reference image",
    product_focus: "Clear product closeup, highlight brand logo, professional lighting",
};

function edit(type: EditType): EditItem {
    return { type, description: EDIT_DESCRIPTIONS[type] };
}

export function planConsistencyEdits(
    imagePaths: readonly string[],
    scenes: readonly Scene[]
): ConsistencyPlan[] {
    return imagePaths.map((imagePath, i) => {
        const scene = scenes[i];
        const sceneNumber = scene?.scene_number ?? i + 1;
        const edits: EditItem[] = [];

        if (i === 0) {
            edits.push(edit("enhance"));
        } else {
            const desc = (scene?.visual_description ?? "").toLowerCase();
            if (desc.includes("wearing headphones") || desc.includes("with headphones")) {
                edits.push(edit("remove_object"));
            }
            edits.push(edit("match_style"), edit("match_character"));
        }

        if (i === imagePaths.length - 1) {
            edits.push(edit("product_focus"));
        }

        return { sceneNumber, imagePath, isReference: i === 0, edits };
    });
}

export function buildEditInstruction(plan: ConsistencyPlan): string {
    const descriptions = plan.edits.map((e) => e.description).join(" ");
    return (
        "Maintain consistent style, lighting, and color tone with reference image. " +
        `${descriptions} ` +
        "Ensure character appearance and clothing exactly match reference image."
    );
}

export function editedImagePath(imagePath: string): string {
    return imagePath.replace(/\.png$/i, "_edited.png");
}

export interface ImageConsistencyOptions {
    client: Pick<SeededitClient, "edit">;
    delayMs: number;
    continueOnError: boolean;
}

export class ImageConsistencyProcessor {
    constructor(private readonly options: ImageConsistencyOptions) {}

    async processAll(imagePaths: readonly string[], scenes: readonly Scene[]): Promise<string[]> {
        const plans = planConsistencyEdits(imagePaths, scenes);
        const results: string[] = [];
        let reference: Buffer | undefined;

        for (const plan of plans) {
            logger.info({ scene: plan.sceneNumber, edits: plan.edits.length }, "編集項目");

            if (plan.isReference) {
                if (isUsableMedia(plan.imagePath)) {
                    reference = fs.readFileSync(plan.imagePath);
                }
                results.push(plan.imagePath);
                continue;
            }

            if (!isUsableMedia(plan.imagePath) || plan.edits.length === 0) {
                results.push(plan.imagePath);
                continue;
            }

            results.push(await this.editOne(plan, reference));
            await sleep(this.options.delayMs);
        }

        logger.info({ count: results.length }, "画像一貫性処理完了");
        return results;
    }

    private async editOne(plan: ConsistencyPlan, reference: Buffer | undefined): Promise<string> {
        try {
            const edited = await this.options.client.edit({
                image: fs.readFileSync(plan.imagePath),
                prompt: buildEditInstruction(plan),
                referenceImage: reference,
            });
            const outPath = editedImagePath(plan.imagePath);
            fs.writeFileSync(outPath, edited);
            return outPath;
        } catch (err) {
            if (!this.options.continueOnError) {
                throw new PipelineError(
                    "consistency",
                    `[ImageConsistencyProcessor] シーン ${plan.sceneNumber} の画像編集に失敗しました: ${errorMessage(err)}`,
                    err,
                );
            }
            logger.warn({ scene: plan.sceneNumber, error: errorMessage(err) }, "画像編集に失敗。元画像を使用");
            return plan.imagePath;
        }
    }
}
