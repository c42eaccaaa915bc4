import type { AnalysisMode } from '../models/mode';
import type { EventRecord } from '../models/eventRecord';

/**
 * Pending input events for one mode.
 */
export interface EventSource {
  readonly mode: AnalysisMode;
  count(): Promise<number>;
  list(): Promise<EventRecord[]>;
  markProcessed(eventIds: string[]): Promise<void>;
}
