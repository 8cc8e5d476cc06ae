/**
 * HTTP session
 * Explicit open/close resource around the shared HTTP client. Closing aborts
 * every request still in flight.
 */
import { logger } from '../observability/logger.js';
import { TransportError } from '../harvest/errors.js';

export type RequestResult =
    | { ok: true; status: number; body: string }
    | { ok: false; error: TransportError };

export interface RequestOptions {
    headers: Record<string, string>;
    timeoutMs: number;
    signal?: AbortSignal;
}

export class HttpSession {
    private controller: AbortController | null = null;

    open(): this {
        if (!this.controller) {
            this.controller = new AbortController();
            logger.debug('HTTP session opened');
        }
        return this;
    }

    get isOpen(): boolean {
        return this.controller !== null;
    }

    /**
     * Issue one GET. Transport failures and timeouts come back as values.
     */
    async request(url: string, options: RequestOptions): Promise<RequestResult> {
        if (!this.controller) {
            return { ok: false, error: new TransportError('HTTP session is closed', { timedOut: false }) };
        }

        const attemptController = new AbortController();
        const sessionSignal = this.controller.signal;
        const abortAttempt = (): void => attemptController.abort();
        let timedOut = false;

        const timeoutId = setTimeout(() => {
            timedOut = true;
            attemptController.abort();
        }, options.timeoutMs);

        sessionSignal.addEventListener('abort', abortAttempt, { once: true });
        options.signal?.addEventListener('abort', abortAttempt, { once: true });
        if (options.signal?.aborted) {
            attemptController.abort();
        }

        try {
            const response = await fetch(url, {
                method: 'GET',
                headers: options.headers,
                redirect: 'follow',
                signal: attemptController.signal,
            });
            const body = await response.text();
            return { ok: true, status: response.status, body };
        } catch (error) {
            const message = timedOut
                ? `Timed out after ${options.timeoutMs}ms`
                : error instanceof Error ? error.message : String(error);
            return { ok: false, error: new TransportError(message, { timedOut, cause: error }) };
        } finally {
            clearTimeout(timeoutId);
            sessionSignal.removeEventListener('abort', abortAttempt);
            options.signal?.removeEventListener('abort', abortAttempt);
        }
    }

    close(): void {
        if (this.controller) {
            this.controller.abort();
            this.controller = null;
            logger.debug('HTTP session closed');
        }
    }
}

/**
 * Run `fn` with an open session; the session is closed on every exit path
 */
export async function withHttpSession<T>(fn: (session: HttpSession) => Promise<T>): Promise<T> {
    const session = new HttpSession().open();
    try {
        return await fn(session);
    } finally {
        session.close();
    }
}
