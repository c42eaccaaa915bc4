import type { AnalysisMode } from './mode';

export const SENTIMENTS = ['Positive', 'Negative', 'Neutral'] as const;

export type Sentiment = typeof SENTIMENTS[number];

export type ProcessingPath = 'on-demand' | 'batch';

export interface AnalysisResult {
  eventId: string;
  mode: AnalysisMode;
  fields: Record<string, string | null>;
  category: string;
  category_explanation: string;
  summary: string;
  sentiment: Sentiment;
  suggested_action: string;
  suggestion_link: string;
  path: ProcessingPath;
  analyzedAt: string;
}

export interface AnalysisFailure {
  status: 'error';
  eventId: string;
  reason: string;
  message: string;
  attempts: number;
}

export type AnalysisOutcome =
  | { status: 'ok'; result: AnalysisResult }
  | AnalysisFailure;

export interface AggregateSummary {
  summary: string;
  plan: string[];
}

export function successfulResults(outcomes: AnalysisOutcome[]): AnalysisResult[] {
  const results: AnalysisResult[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === 'ok') {
      results.push(outcome.result);
    }
  }
  return results;
}
