/**
 * Harvester error taxonomy
 * Per-source errors end up as data in the report; only ConfigurationError rejects a run.
 */

export type HarvesterErrorCode =
    | 'TRANSPORT'
    | 'HTTP_STATUS'
    | 'EXTRACTION'
    | 'CONFIGURATION'
    | 'PERSISTENCE'
    | 'DISPATCH_CANCELLED';

export class HarvesterError extends Error {
    readonly code: HarvesterErrorCode;

    constructor(code: HarvesterErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'HarvesterError';
        this.code = code;
    }
}

/**
 * Connection failure or timeout during a fetch attempt
 */
export class TransportError extends HarvesterError {
    readonly timedOut: boolean;

    constructor(message: string, options: { timedOut: boolean; cause?: unknown }) {
        super('TRANSPORT', message, { cause: options.cause });
        this.name = 'TransportError';
        this.timedOut = options.timedOut;
    }
}

/**
 * Any response status other than 200
 */
export class HttpStatusError extends HarvesterError {
    readonly status: number;

    constructor(status: number) {
        super('HTTP_STATUS', `HTTP ${status}`);
        this.name = 'HttpStatusError';
        this.status = status;
    }
}

export class ExtractionError extends HarvesterError {
    readonly sourceId: string;

    constructor(sourceId: string, message: string, options?: { cause?: unknown }) {
        super('EXTRACTION', message, options);
        this.name = 'ExtractionError';
        this.sourceId = sourceId;
    }
}

export class ConfigurationError extends HarvesterError {
    constructor(message: string) {
        super('CONFIGURATION', message);
        this.name = 'ConfigurationError';
    }
}

export type PersistenceOperation = 'snapshot' | 'bulk_insert' | 'sink';

export class PersistenceError extends HarvesterError {
    readonly operation: PersistenceOperation;

    constructor(operation: PersistenceOperation, message: string, options?: { cause?: unknown }) {
        super('PERSISTENCE', message, options);
        this.name = 'PersistenceError';
        this.operation = operation;
    }
}

/**
 * Raised by the limiter for tasks still queued when the run is cancelled
 */
export class DispatchCancelledError extends HarvesterError {
    constructor() {
        super('DISPATCH_CANCELLED', 'Dispatch cancelled before start');
        this.name = 'DispatchCancelledError';
    }
}

export function errorSummary(error: unknown): string {
    return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}
