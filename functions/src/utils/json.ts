/**
 * Pulls the first JSON object out of a model reply. Replies are often wrapped in
 * markdown fences or prefixed with prose.
 */
export function extractJsonObject(text: string): Record<string, unknown> | null {
  const trimmed = text.trim();
  const fenced = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/i);
  const candidate = fenced ? fenced[1].trim() : trimmed;

  const direct = tryParseObject(candidate);
  if (direct) {
    return direct;
  }

  const start = candidate.indexOf('{');
  const end = candidate.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return null;
  }
  return tryParseObject(candidate.slice(start, end + 1));
}

export function toJsonl(records: unknown[]): string {
  return records.map(record => JSON.stringify(record)).join('\n') + '\n';
}

export function parseJsonl(text: string): { records: unknown[]; invalidLines: number[] } {
  const records: unknown[] = [];
  const invalidLines: number[] = [];

  text.split(/\r?\n/).forEach((line, index) => {
    if (line.trim().length === 0) {
      return;
    }
    try {
      records.push(JSON.parse(line));
    } catch {
      invalidLines.push(index + 1);
    }
  });

  return { records, invalidLines };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}
