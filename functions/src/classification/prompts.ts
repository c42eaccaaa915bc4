import type { AnalysisMode } from '../models/mode';
import { SENTIMENTS } from '../models/analysis';
import { EventRecord, renderEventForPrompt } from '../models/eventRecord';
import { ChatMessage } from './types';
import { Taxonomy, renderTaxonomyContext } from './taxonomy';

interface Persona {
  role: string;
  eventNoun: string;
  aggregateFocus: string;
}

const PERSONAS: Record<AnalysisMode, Persona> = {
  cases: {
    role: 'You are a technical account manager responsible for the cloud accounts of a customer.',
    eventNoun: 'support case',
    aggregateFocus: "the customer's resilience",
  },
  health: {
    role: 'You are an SRE manager responsible for the operational health of cloud infrastructure.',
    eventNoun: 'health event',
    aggregateFocus: 'operational health and monitoring',
  },
};

const ANALYSIS_OUTPUT_FORMAT = {
  category: '<one of the listed categories>',
  category_explanation: '<why the category was picked>',
  event_summary: '<short summary of the event>',
  sentiment: SENTIMENTS.join(' | '),
  suggested_action: '<how to fix the issue and prevent it from recurring>',
  suggestion_link: '<documentation link supporting the suggested action>',
};

const AGGREGATE_OUTPUT_FORMAT = {
  summary: '<overall summary>',
  plan: ['<improvement step>'],
};

export function buildAnalysisMessages(mode: AnalysisMode, taxonomy: Taxonomy, event: EventRecord): ChatMessage[] {
  const persona = PERSONAS[mode];
  const system = [
    persona.role,
    `You categorize each ${persona.eventNoun} into exactly one of the following categories:`,
    renderTaxonomyContext(taxonomy),
    '',
    `If the ${persona.eventNoun} does not match any category, return ${taxonomy.fallbackLabel}.`,
    'Explain why the category was picked in category_explanation.',
    `Summarize the ${persona.eventNoun} in event_summary.`,
    `Sentiment must be one of: ${SENTIMENTS.join(', ')}.`,
    'The suggested action must say how to fix the issue and prevent it from recurring.',
    'Respond with JSON in the following format and nothing else:',
    JSON.stringify(ANALYSIS_OUTPUT_FORMAT),
  ].join('\n');

  return [
    { role: 'system', content: system },
    { role: 'user', content: `Categorize this ${persona.eventNoun}:\n\n${renderEventForPrompt(event)}` },
  ];
}

export function buildAggregateMessages(mode: AnalysisMode, serializedResults: string): ChatMessage[] {
  const persona = PERSONAS[mode];
  const system = [
    persona.role,
    `You review the summaries of every analyzed ${persona.eventNoun} to form an aggregate view.`,
    `Return an overall summary of ${persona.aggregateFocus} as summary. Discuss the recurring themes.`,
    `Do not discuss individual ${persona.eventNoun}s in the summary.`,
    `Return an ordered list of steps to improve ${persona.aggregateFocus} as plan.`,
    'Respond with JSON in the following format and nothing else:',
    JSON.stringify(AGGREGATE_OUTPUT_FORMAT),
  ].join('\n');

  return [
    { role: 'system', content: system },
    { role: 'user', content: `Analyzed ${persona.eventNoun}s:\n\n${serializedResults}` },
  ];
}

export function buildCondenseMessages(mode: AnalysisMode, chunk: string): ChatMessage[] {
  const persona = PERSONAS[mode];
  const system = [
    persona.role,
    `Condense the following analyzed ${persona.eventNoun}s into a short list of themes.`,
    'Keep the categories, sentiments and recurring problems. Plain text only.',
  ].join('\n');

  return [
    { role: 'system', content: system },
    { role: 'user', content: chunk },
  ];
}
