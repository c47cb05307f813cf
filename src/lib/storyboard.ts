/**
 * storyboard.ts
 *
 * 広告ストーリー → ストーリーボード (シーン配列) の変換まわり。
 * - LLM へのプロンプト構築
 * - 応答テキストからの JSON 抽出 (```json フェンス対応)
 * - Zod による検証とデフォルト値の補完
 * - 人が読むためのテキスト版の出力
 *
 * Ad Pipeline — Storyboard Layer
 */

import { z } from "zod";
import { StoryboardParseError, errorMessage } from "./errors.js";

// ============================================================
// Zod スキーマ
// ============================================================

export const AUDIO_TYPES = ["cafe", "calm", "product"] as const;

const AudioTypeSchema = z.enum(AUDIO_TYPES);
export type AudioType = z.infer<typeof AudioTypeSchema>;

export const DEFAULT_SCENE_DURATION = 8;

// モデルが "8" のように文字列で数値を返すことがある
const NumericSchema = z.union([
    z.number(),
    z.string().trim().regex(/^\d+(\.\d+)?$/).transform(Number),
]);

// null は未指定と同じ扱い (デフォルト値で補完)
const RawSceneSchema = z.object({
    scene_number: NumericSchema.pipe(z.number().int().positive()).nullable().optional(),
    duration: NumericSchema.pipe(z.number().positive()).nullable().optional(),
    visual_description: z.string().nullable().optional(),
    action: z.string().nullable().optional(),
    dialogue: z.string().nullable().optional(),
    camera_angle: z.string().nullable().optional(),
    audio_type: z.string().nullable().optional(),
});

export interface Scene {
    scene_number: number;
    duration: number;
    visual_description: string;
    action: string;
    dialogue: string;
    camera_angle: string;
    audio_type: AudioType;
}

const StoryboardAnswerSchema = z.union([
    z.array(RawSceneSchema),
    z.object({ scenes: z.array(RawSceneSchema) }).passthrough(),
]);

// ============================================================
// プロンプト
// ============================================================

export function buildStoryboardPrompt(story: string, sceneCount: number): string {
    return `Based on the following wireless headphone advertisement story, create a detailed storyboard for a ${sceneCount * 8}-second video.

Requirements:
1. Break the story into exactly ${sceneCount} scenes, each 8-10 seconds
2. Each scene must include:
   - scene_number: Scene number
   - duration: Duration in seconds
   - visual_description: Detailed visual description with character appearance, environment, lighting, product display angle, color tone
   - action: Specific action description for video animation
   - dialogue: Dialogue or voiceover text if any
   - camera_angle: Camera angle
   - audio_type: Type of audio for this scene, must be one of: "cafe", "calm", "product"
     * "cafe": Use for scenes before wearing headphones (noisy cafe ambience)
     * "calm": Use for scenes with headphones on (calm music)
     * "product": Use for final product showcase scenes (upbeat music)

3. Special attention:
   - First scene: Establish character and product style with detailed description, audio_type should be "cafe"
   - Middle scenes with headphones: audio_type should be "calm"
   - Last scene: Product close-up highlighting brand logo, audio_type should be "product"
   - Keep character appearance and clothing consistent across all scenes
   - Ensure logical continuity between scenes

4. Output format: Pure JSON array only

Original story:
${story}

Output JSON storyboard.
`;
}

// ============================================================
// 応答パース
// ============================================================

/**
 * モデル応答から JSON 部分だけを取り出す。
 * ```json ... ``` → ``` ... ``` → 全文 の順に試す。
 */
export function extractJsonText(answer: string): string {
    const fenced = /```json\s*([\s\S]*?)```/.exec(answer) ?? /```\s*([\s\S]*?)```/.exec(answer);
    if (fenced) {
        return fenced[1].trim();
    }
    return answer.trim();
}

export function parseStoryboard(answer: string): Scene[] {
    const jsonText = extractJsonText(answer);

    let raw: unknown;
    try {
        raw = JSON.parse(jsonText);
    } catch (err) {
        throw new StoryboardParseError(
            `[storyboard] JSON のパースに失敗しました: ${errorMessage(err)}`,
            answer,
            err,
        );
    }

    const parsed = StoryboardAnswerSchema.safeParse(raw);
    if (!parsed.success) {
        const message = hasSceneArray(raw)
            ? `[storyboard] シーンの形式が不正です: ${formatIssues(parsed.error)}`
            : "[storyboard] シーン配列 (または scenes フィールド) が見つかりません";
        throw new StoryboardParseError(message, answer, parsed.error);
    }

    const rawScenes = Array.isArray(parsed.data) ? parsed.data : parsed.data.scenes;
    if (rawScenes.length === 0) {
        throw new StoryboardParseError("[storyboard] シーンが 1 つもありません", answer);
    }

    return rawScenes.map((scene, index) => ({
        scene_number: scene.scene_number ?? index + 1,
        duration: scene.duration ?? DEFAULT_SCENE_DURATION,
        visual_description: scene.visual_description ?? "",
        action: scene.action ?? "",
        dialogue: scene.dialogue ?? "",
        camera_angle: scene.camera_angle ?? "",
        audio_type: toAudioType(scene.audio_type),
    }));
}

function hasSceneArray(raw: unknown): boolean {
    if (Array.isArray(raw)) return true;
    return typeof raw === "object" && raw !== null && "scenes" in raw && Array.isArray(raw.scenes);
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
}

function toAudioType(value: string | null | undefined): AudioType {
    const parsed = AudioTypeSchema.safeParse(value?.trim().toLowerCase());
    return parsed.success ? parsed.data : "calm";
}

// ============================================================
// 出力
// ============================================================

export function totalDuration(scenes: readonly Scene[]): number {
    return scenes.reduce((sum, scene) => sum + scene.duration, 0);
}

export function renderReadableStoryboard(scenes: readonly Scene[]): string {
    const separator = "=".repeat(60);
    return scenes
        .map((scene, index) =>
            [
                "",
                separator,
                `Scene ${index + 1}: ${scene.duration}s`,
                separator,
                `Visual: ${scene.visual_description}`,
                "",
                `Action: ${scene.action}`,
                "",
                `Dialogue: ${scene.dialogue}`,
                "",
                `Camera: ${scene.camera_angle}`,
                `Audio Type: ${scene.audio_type}`,
                "",
            ].join("\n"),
        )
        .join("");
}
