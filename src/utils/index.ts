/**
 * Utility modules export
 */

export { Logger, initLogger, getLogger } from './logger';
export { MetricsCollector } from './metrics';
export { withDeadline, untilAborted, remainingBudget, DeadlineExceeded, Cancelled } from './deadline';
export { runBounded, independentBatches } from './worker-pool';
