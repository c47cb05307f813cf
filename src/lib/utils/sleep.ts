/**
 * sleep.ts
 *
 * 固定待機ユーティリティ。API 呼び出し間の間隔調整とタスクのポーリングに使う。
 */

export class AbortedError extends Error {
    constructor() {
        super("処理がキャンセルされました");
        this.name = "AbortedError";
    }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new AbortedError());
            return;
        }
        if (ms <= 0) {
            resolve();
            return;
        }

        const timer = setTimeout(resolve, ms);

        signal?.addEventListener(
            "abort",
            () => {
                clearTimeout(timer);
                reject(new AbortedError());
            },
            { once: true }
        );
    });
}
