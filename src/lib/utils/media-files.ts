/**
 * media-files.ts
 *
 * 出力ディレクトリ構成とメディアファイルの共通処理。
 * 生成に失敗したステップは 1000 バイト未満のプレースホルダーを残し、
 * 後続ステップはそれを「使えないメディア」としてスキップする。
 */

import * as fs from "fs";
import * as path from "path";

export const PLACEHOLDER_MAX_BYTES = 1000;

export interface OutputLayout {
    root: string;
    storyboard: string;
    images: string;
    clips: string;
    colorMatched: string;
    audio: string;
    final: string;
}

export function createOutputLayout(root: string): OutputLayout {
    const base = path.resolve(root);
    return {
        root: base,
        storyboard: path.join(base, "01_storyboard"),
        images: path.join(base, "02_images"),
        clips: path.join(base, "03_video_clips"),
        colorMatched: path.join(base, "temp_color_match"),
        audio: path.join(base, "audio"),
        final: path.join(base, "04_final"),
    };
}

export function ensureOutputLayout(layout: OutputLayout): void {
    for (const dir of Object.values(layout)) {
        fs.mkdirSync(dir, { recursive: true });
    }
}

/** 1 始まりのシーン番号を 2 桁ゼロ埋めする (scene_01, clip_07 など) */
export function sceneFileName(prefix: string, sceneNumber: number, ext: string): string {
    return `${prefix}_${String(sceneNumber).padStart(2, "0")}${ext}`;
}

export function isUsableMedia(filePath: string): boolean {
    try {
        return fs.statSync(filePath).size >= PLACEHOLDER_MAX_BYTES;
    } catch {
        return false;
    }
}

export function writePlaceholder(filePath: string, label: string): void {
    fs.writeFileSync(filePath, `Placeholder for ${label}`);
}

export function writeDiagnostics(filePath: string, lines: string[]): void {
    fs.writeFileSync(filePath, `${lines.join("\n")}\n`, "utf-8");
}

export function toPngDataUrl(data: Buffer): string {
    return `data:image/png;base64,${data.toString("base64")}`;
}
