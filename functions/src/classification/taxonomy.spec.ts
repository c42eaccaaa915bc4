import assert from 'node:assert/strict';
import path from 'node:path';
import test from 'node:test';
import { ConfigurationError } from '../errors';
import { loadTaxonomy, normalizeCategory, parseTaxonomy, renderTaxonomyContext, taxonomyLabels } from './taxonomy';

const TAXONOMY_DIR = path.resolve(__dirname, '..', '..', 'taxonomy');

test('taxonomy', async t => {
  await t.test('loads the bundled taxonomies with the fallback as a member', () => {
    const cases = loadTaxonomy('cases', TAXONOMY_DIR);
    const health = loadTaxonomy('health', TAXONOMY_DIR);

    assert.equal(cases.mode, 'cases');
    assert.equal(cases.fallbackLabel, 'other');
    assert.equal(taxonomyLabels(cases)[0], 'limit-reached');
    assert.ok(taxonomyLabels(cases).includes('other'));
    assert.equal(health.mode, 'health');
    assert.ok(taxonomyLabels(health).includes('scheduled-change'));
  });

  await t.test('missing files are configuration errors', () => {
    assert.throws(() => loadTaxonomy('cases', path.join(TAXONOMY_DIR, 'missing')), ConfigurationError);
  });

  await t.test('rejects a fallback that is not a member', () => {
    assert.throws(
      () => parseTaxonomy('cases', {
        mode: 'cases',
        fallbackLabel: 'misc',
        categories: [{ label: 'throttling', description: 'x', exemplars: [] }],
      }),
      /Fallback label misc is not part of the cases taxonomy/,
    );
  });

  await t.test('rejects duplicate labels and mismatched modes', () => {
    const categories = [
      { label: 'Throttling', description: '' },
      { label: 'throttling', description: '' },
      { label: 'other', description: '' },
    ];
    assert.throws(
      () => parseTaxonomy('cases', { mode: 'cases', fallbackLabel: 'other', categories }),
      /Duplicate taxonomy label throttling/,
    );
    assert.throws(
      () => parseTaxonomy('cases', { mode: 'health', fallbackLabel: 'other', categories: [{ label: 'other' }] }),
      /declares mode health, expected cases/,
    );
  });

  await t.test('normalizeCategory matches loosely and falls back otherwise', () => {
    const taxonomy = loadTaxonomy('cases', TAXONOMY_DIR);

    assert.deepEqual(normalizeCategory(taxonomy, 'Limit Reached'), { label: 'limit-reached', matched: true });
    assert.deepEqual(normalizeCategory(taxonomy, 'ICE error'), { label: 'ice-error', matched: true });
    assert.deepEqual(normalizeCategory(taxonomy, 'billing dispute'), { label: 'other', matched: false });
    assert.deepEqual(normalizeCategory(taxonomy, 42), { label: 'other', matched: false });
  });

  await t.test('renders numbered labels with descriptions and examples', () => {
    const taxonomy = parseTaxonomy('health', {
      mode: 'health',
      fallbackLabel: 'other',
      categories: [
        { label: 'service-issue', description: 'Degraded service.', exemplars: ['Elevated errors'] },
        { label: 'other', description: '' },
      ],
    });

    assert.equal(
      renderTaxonomyContext(taxonomy),
      [
        '1. service-issue',
        '   Description: Degraded service.',
        '   Examples:',
        '   - Elevated errors',
        '2. other',
      ].join('\n'),
    );
  });
});
