import client from 'prom-client';

/**
 * Metrics Service - Prometheus metrics for observability
 */

// Create registry
export const register = new client.Registry();

// Collect default metrics (CPU, memory, etc.)
client.collectDefaultMetrics({ register });

// HTTP request latency histogram
export const reqLatency = new client.Histogram({
  name: 'http_request_duration_ms',
  help: 'HTTP request latency in milliseconds',
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000],
  labelNames: ['route', 'method', 'code'],
});
register.registerMetric(reqLatency);

// Executed trade counter
export const tradesExecuted = new client.Counter({
  name: 'trades_executed_total',
  help: 'Total trades filled by the execution service',
  labelNames: ['instrument', 'side'],
});
register.registerMetric(tradesExecuted);

// Scan cycle outcome counter
export const scanCycles = new client.Counter({
  name: 'scan_cycles_total',
  help: 'Scan cycles by outcome',
  labelNames: ['outcome'], // 'gated', 'no_opportunity', 'below_threshold', 'executed', 'failed'
});
register.registerMetric(scanCycles);

// Scan cycle duration histogram
export const scanCycleDuration = new client.Histogram({
  name: 'scan_cycle_duration_ms',
  help: 'Scan cycle duration in milliseconds',
  buckets: [100, 250, 500, 1000, 2500, 5000, 15000],
});
register.registerMetric(scanCycleDuration);

// Supervisor failure budget gauge
export const supervisorFailures = new client.Gauge({
  name: 'supervisor_consecutive_failures',
  help: 'Consecutive trading loop failures seen by the supervisor',
});
register.registerMetric(supervisorFailures);

// Trading enabled gauge
export const tradingEnabled = new client.Gauge({
  name: 'bot_trading_enabled',
  help: 'Trading flag (1=enabled, 0=halted)',
});
register.registerMetric(tradingEnabled);

// API call counter
export const apiCalls = new client.Counter({
  name: 'market_api_calls_total',
  help: 'Total market/execution service calls',
  labelNames: ['endpoint', 'status'],
});
register.registerMetric(apiCalls);

export type ScanOutcome = 'gated' | 'no_opportunity' | 'below_threshold' | 'executed' | 'failed';

/**
 * Helper functions to update metrics
 */

export function recordHttpRequest(route: string, method: string, code: number, durationMs: number) {
  reqLatency.labels(route, method, code.toString()).observe(durationMs);
}

export function recordTradeExecuted(instrument: string, side: string) {
  tradesExecuted.labels(instrument, side).inc();
}

export function recordScanCycle(outcome: ScanOutcome, durationMs?: number) {
  scanCycles.labels(outcome).inc();
  if (durationMs !== undefined) {
    scanCycleDuration.observe(durationMs);
  }
}

export function updateSupervisorFailures(count: number) {
  supervisorFailures.set(count);
}

export function updateTradingEnabled(enabled: boolean) {
  tradingEnabled.set(enabled ? 1 : 0);
}

export function recordApiCall(endpoint: string, status: 'ok' | 'error') {
  apiCalls.labels(endpoint, status).inc();
}
