import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../errors';
import type { AnalysisMode } from '../models/mode';
import { createSlug } from '../utils/slug';

export interface Category {
  label: string;
  description: string;
  exemplars: string[];
}

export interface Taxonomy {
  mode: AnalysisMode;
  categories: Category[];
  fallbackLabel: string;
}

const CategorySchema = z.object({
  label: z.string().min(1),
  description: z.string().default(''),
  exemplars: z.array(z.string()).default([]),
});

const TaxonomySchema = z.object({
  mode: z.string().min(1),
  fallbackLabel: z.string().min(1),
  categories: z.array(CategorySchema).min(1),
});

export function loadTaxonomy(mode: AnalysisMode, dir: string): Taxonomy {
  const file = path.join(dir, `${mode}.json`);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Unable to read taxonomy for mode ${mode} at ${file}: ${error instanceof Error ? error.message : String(error)}`);
  }

  return parseTaxonomy(mode, raw);
}

export function parseTaxonomy(mode: AnalysisMode, raw: unknown): Taxonomy {
  const parsed = TaxonomySchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid taxonomy for mode ${mode}`, issues);
  }

  const { categories, fallbackLabel } = parsed.data;
  if (parsed.data.mode !== mode) {
    throw new ConfigurationError(`Taxonomy file declares mode ${parsed.data.mode}, expected ${mode}`);
  }

  const seen = new Set<string>();
  for (const category of categories) {
    const key = categoryKey(category.label);
    if (seen.has(key)) {
      throw new ConfigurationError(`Duplicate taxonomy label ${category.label} for mode ${mode}`);
    }
    seen.add(key);
  }

  if (!categories.some(category => category.label === fallbackLabel)) {
    throw new ConfigurationError(`Fallback label ${fallbackLabel} is not part of the ${mode} taxonomy`);
  }

  return {
    mode,
    categories: categories.map(category => ({
      label: category.label,
      description: category.description,
      exemplars: [...category.exemplars],
    })),
    fallbackLabel,
  };
}

export function taxonomyLabels(taxonomy: Taxonomy): string[] {
  return taxonomy.categories.map(category => category.label);
}

/**
 * Maps a label returned by the model onto a taxonomy member. Anything unrecognised
 * lands on the fallback label.
 */
export function normalizeCategory(taxonomy: Taxonomy, raw: unknown): { label: string; matched: boolean } {
  if (typeof raw !== 'string' || raw.trim().length === 0) {
    return { label: taxonomy.fallbackLabel, matched: false };
  }

  const key = categoryKey(raw);
  const match = taxonomy.categories.find(category => categoryKey(category.label) === key);
  if (match) {
    return { label: match.label, matched: true };
  }
  return { label: taxonomy.fallbackLabel, matched: false };
}

export function renderTaxonomyContext(taxonomy: Taxonomy): string {
  return taxonomy.categories
    .map((category, index) => {
      const lines = [`${index + 1}. ${category.label}`];
      if (category.description) {
        lines.push(`   Description: ${category.description}`);
      }
      if (category.exemplars.length > 0) {
        lines.push('   Examples:');
        for (const exemplar of category.exemplars.slice(0, 5)) {
          lines.push(`   - ${exemplar}`);
        }
      }
      return lines.join('\n');
    })
    .join('\n');
}

function categoryKey(label: string): string {
  return createSlug(label);
}
