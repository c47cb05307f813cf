/**
 * logger.ts
 *
 * 構造化ロギング: pino ベースの JSON ログ出力
 * レベル制御 + モジュール単位のコンテキスト付きロガー生成を提供。
 *
 * Ad Pipeline — Observability Layer
 */

import { pino, type Logger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

const envLevel = process.env.LOG_LEVEL;
const DEFAULT_LEVEL: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

const rootLogger = pino({
    level: DEFAULT_LEVEL,
    name: "ad-pipeline",
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
        level(label: string) {
            return { level: label };
        },
    },
});

// pino の child はレベルを生成時にコピーするため、後からの変更用に保持する
const moduleLoggers = new Set<Logger>();

export function createLogger(module: string): Logger {
    const child = rootLogger.child({ module });
    moduleLoggers.add(child);
    return child;
}

export function setLogLevel(level: LogLevel): void {
    rootLogger.level = level;
    for (const child of moduleLoggers) {
        child.level = level;
    }
}

export const logger = rootLogger;
