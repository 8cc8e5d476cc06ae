/**
 * Prometheus metrics for the harvester
 * Exported through the textfile collector after each run (no HTTP surface)
 */
import client from 'prom-client';

// Create a Registry
export const registry = new client.Registry();

// Add default metrics (process CPU, memory, etc.)
client.collectDefaultMetrics({ register: registry });

// ============================================================================
// FETCH METRICS
// ============================================================================

/**
 * Counter: Fetch attempts by outcome (ok, http_status, transport, timeout, cancelled)
 */
export const fetchAttemptsTotal = new client.Counter({
    name: 'harvester_fetch_attempts_total',
    help: 'Total number of HTTP fetch attempts',
    labelNames: ['outcome'] as const,
    registers: [registry],
});

/**
 * Histogram: Duration of a whole attempt sequence in seconds
 */
export const fetchDuration = new client.Histogram({
    name: 'harvester_fetch_duration_seconds',
    help: 'Fetch duration including retries in seconds',
    labelNames: ['result'] as const,
    buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
    registers: [registry],
});

/**
 * Gauge: Fetches currently holding a limiter slot
 */
export const inFlightFetches = new client.Gauge({
    name: 'harvester_in_flight_fetches',
    help: 'Number of fetches currently in flight',
    registers: [registry],
});

// ============================================================================
// HARVEST METRICS
// ============================================================================

/**
 * Counter: Report entries by status
 */
export const harvestEntriesTotal = new client.Counter({
    name: 'harvester_report_entries_total',
    help: 'Harvest report entries by status',
    labelNames: ['status'] as const,
    registers: [registry],
});

/**
 * Histogram: Whole run duration
 */
export const harvestRunDuration = new client.Histogram({
    name: 'harvester_run_duration_seconds',
    help: 'Harvest run duration in seconds',
    labelNames: ['complete'] as const,
    buckets: [1, 5, 10, 30, 60, 120, 300],
    registers: [registry],
});

// ============================================================================
// PERSISTENCE METRICS
// ============================================================================

/**
 * Counter: Player rows handled by the sink
 */
export const playerRowsTotal = new client.Counter({
    name: 'harvester_player_rows_total',
    help: 'Player rows forwarded or dropped by the result sink',
    labelNames: ['result'] as const,
    registers: [registry],
});

/**
 * Gauge: Circuit breaker state (0 = closed, 1 = open, 2 = half-open)
 */
export const circuitState = new client.Gauge({
    name: 'harvester_circuit_state',
    help: 'Circuit breaker state (0=closed, 1=open, 2=half-open)',
    labelNames: ['dependency'] as const,
    registers: [registry],
});

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Get metrics as Prometheus text format
 */
export async function getMetrics(): Promise<string> {
    return registry.metrics();
}
