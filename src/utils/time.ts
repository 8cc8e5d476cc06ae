/**
 * Timer helpers
 */

/**
 * Wait for `ms` milliseconds; resolves early when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise(resolve => {
        if (signal?.aborted || ms <= 0) {
            resolve();
            return;
        }

        const done = (): void => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', done);
            resolve();
        };

        const timer = setTimeout(done, ms);
        signal?.addEventListener('abort', done, { once: true });
    });
}

/**
 * Unix timestamp in whole seconds
 */
export function unixSeconds(date: Date = new Date()): number {
    return Math.floor(date.getTime() / 1000);
}
