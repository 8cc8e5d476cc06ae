/**
 * Scheduler Service
 * Re-runs the harvest on a fixed interval until stopped
 */
import { createLogger } from '../observability/logger.js';
import { sleep } from '../utils/time.js';
import type { HarvestReport } from '../harvest/types.js';

export interface ContinuousHarvestOptions {
    intervalMs: number;
    retryDelayMs: number;
    runCycle: (signal: AbortSignal) => Promise<HarvestReport>;
}

export interface ContinuousHarvestHandle {
    /** Resolves once the current cycle (if any) has wound down */
    stop(): Promise<void>;
    readonly cycles: number;
}

/**
 * Start a harvest loop. A thrown cycle is logged and retried after
 * `retryDelayMs` instead of `intervalMs`.
 */
export function startContinuousHarvest(options: ContinuousHarvestOptions): ContinuousHarvestHandle {
    const scheduleLogger = createLogger({ stage: 'schedule' });
    const controller = new AbortController();
    let cycles = 0;

    scheduleLogger.info(`Starting continuous harvesting (every ${options.intervalMs / 60000} minutes)`);

    const loop = async (): Promise<void> => {
        while (!controller.signal.aborted) {
            let waitMs = options.intervalMs;
            try {
                const report = await options.runCycle(controller.signal);
                cycles++;
                scheduleLogger.info(
                    `Harvest cycle completed: ${report.summary.succeeded}/${report.summary.total} sites successful`,
                    { runId: report.runId, complete: report.complete }
                );
            } catch (error) {
                cycles++;
                waitMs = options.retryDelayMs;
                scheduleLogger.error('Error in continuous harvesting', error, { retryDelayMs: waitMs });
            }
            await sleep(waitMs, controller.signal);
        }
    };

    const running = loop();

    return {
        async stop(): Promise<void> {
            controller.abort();
            await running;
            scheduleLogger.info('Continuous harvesting stopped', { cycles });
        },
        get cycles(): number {
            return cycles;
        },
    };
}
