import { ConfigurationError } from '../errors';
import type { RouteDecision } from '../models/run';

/**
 * Picks the processing path for a run. Zero events short-circuits both paths.
 */
export function route(eventCount: number, threshold: number): RouteDecision {
  if (!Number.isInteger(eventCount) || eventCount < 0) {
    throw new RangeError(`eventCount must be a non-negative integer, got ${eventCount}`);
  }
  if (eventCount === 0) {
    return 'no-events';
  }
  return eventCount >= threshold ? 'batch' : 'on-demand';
}

export function validateThreshold(threshold: number, minBatchSize: number): void {
  if (!Number.isInteger(threshold) || threshold <= 0) {
    throw new ConfigurationError(`Batch threshold must be a positive integer, got ${threshold}`);
  }
  if (threshold < minBatchSize) {
    throw new ConfigurationError(
      `Batch threshold ${threshold} is below the job runner minimum batch size ${minBatchSize}`,
    );
  }
}
