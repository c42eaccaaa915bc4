export const ANALYSIS_MODES = ['cases', 'health'] as const;

export type AnalysisMode = typeof ANALYSIS_MODES[number];

export function isAnalysisMode(value: unknown): value is AnalysisMode {
  return ANALYSIS_MODES.some(mode => mode === value);
}
