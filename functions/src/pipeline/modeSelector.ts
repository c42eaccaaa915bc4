import * as logger from 'firebase-functions/logger';
import { ConfigurationError } from '../errors';
import { ANALYSIS_MODES, type AnalysisMode, isAnalysisMode } from '../models/mode';
import type { ModeStore } from '../services/modeStore';

export class ModeSelector {
  private readonly store: ModeStore;
  private readonly defaultMode: AnalysisMode | null;

  constructor(store: ModeStore, defaultMode: AnalysisMode | null = null) {
    this.store = store;
    this.defaultMode = defaultMode;
  }

  /**
   * Reads the persisted mode on every call so an operator flip applies to the next run.
   */
  async resolve(): Promise<AnalysisMode> {
    const value = await this.store.getMode();
    if (isAnalysisMode(value)) {
      return value;
    }

    const problem = value === null
      ? 'Analysis mode is not set'
      : `Analysis mode ${JSON.stringify(value)} is not one of ${ANALYSIS_MODES.join(', ')}`;

    if (this.defaultMode) {
      logger.warn(`[mode] ${problem}, falling back to ${this.defaultMode}`);
      return this.defaultMode;
    }
    throw new ConfigurationError(problem);
  }
}
