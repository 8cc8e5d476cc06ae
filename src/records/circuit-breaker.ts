/**
 * Circuit Breaker implementation
 *
 * States:
 * - CLOSED: Normal operation, requests pass through
 * - OPEN: Failures exceeded threshold, requests fail fast
 * - HALF_OPEN: Testing if the dependency recovered
 */
import { logger } from '../observability/logger.js';
import { circuitState } from '../observability/metrics.js';

export enum CircuitState {
    CLOSED = 0,
    OPEN = 1,
    HALF_OPEN = 2,
}

export interface CircuitBreakerConfig {
    name: string;
    failureThreshold: number;      // Failures before opening
    resetTimeout: number;          // ms before transitioning to half-open
    halfOpenRequests: number;      // Trial requests in half-open state
}

const DEFAULT_CONFIG: Omit<CircuitBreakerConfig, 'name'> = {
    failureThreshold: 5,
    resetTimeout: 30000,
    halfOpenRequests: 3,
};

export class CircuitBreaker {
    private state: CircuitState = CircuitState.CLOSED;
    private consecutiveFailures = 0;
    private halfOpenSuccesses = 0;
    private halfOpenAttempts = 0;
    private openedAt = 0;
    private readonly config: CircuitBreakerConfig;

    constructor(config: Partial<CircuitBreakerConfig> & { name: string }) {
        this.config = { ...DEFAULT_CONFIG, ...config };
        circuitState.labels(this.config.name).set(this.state);
    }

    /**
     * Execute a function with circuit breaker protection
     */
    async execute<T>(fn: () => Promise<T>): Promise<T> {
        const state = this.getState();

        if (state === CircuitState.OPEN) {
            throw new CircuitOpenError(this.config.name);
        }

        if (state === CircuitState.HALF_OPEN) {
            if (this.halfOpenAttempts >= this.config.halfOpenRequests) {
                throw new CircuitOpenError(this.config.name);
            }
            this.halfOpenAttempts++;
        }

        let result: T;
        try {
            result = await fn();
        } catch (error) {
            this.recordFailure();
            throw error;
        }

        this.recordSuccess();
        return result;
    }

    getState(): CircuitState {
        if (this.state === CircuitState.OPEN && Date.now() - this.openedAt >= this.config.resetTimeout) {
            this.transitionTo(CircuitState.HALF_OPEN);
        }
        return this.state;
    }

    isAllowingRequests(): boolean {
        const state = this.getState();
        return state === CircuitState.CLOSED ||
            (state === CircuitState.HALF_OPEN && this.halfOpenAttempts < this.config.halfOpenRequests);
    }

    reset(): void {
        this.transitionTo(CircuitState.CLOSED);
    }

    private recordSuccess(): void {
        if (this.state === CircuitState.HALF_OPEN) {
            this.halfOpenSuccesses++;
            if (this.halfOpenSuccesses >= this.config.halfOpenRequests) {
                this.transitionTo(CircuitState.CLOSED);
            }
            return;
        }
        this.consecutiveFailures = 0;
    }

    private recordFailure(): void {
        this.consecutiveFailures++;

        // Any failure while half-open reopens
        if (this.state === CircuitState.HALF_OPEN ||
            (this.state === CircuitState.CLOSED && this.consecutiveFailures >= this.config.failureThreshold)) {
            this.openedAt = Date.now();
            this.transitionTo(CircuitState.OPEN);
        }
    }

    private transitionTo(next: CircuitState): void {
        const previous = this.state;
        this.state = next;
        this.halfOpenAttempts = 0;
        this.halfOpenSuccesses = 0;
        if (next === CircuitState.CLOSED) {
            this.consecutiveFailures = 0;
        }

        logger.info(`Circuit breaker ${this.config.name} transitioned`, {
            from: CircuitState[previous],
            to: CircuitState[next],
        });
        circuitState.labels(this.config.name).set(next);
    }
}

/**
 * Error thrown when circuit is open
 */
export class CircuitOpenError extends Error {
    constructor(circuitName: string) {
        super(`Circuit breaker '${circuitName}' is open`);
        this.name = 'CircuitOpenError';
    }
}
