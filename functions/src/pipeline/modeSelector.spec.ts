import assert from 'node:assert/strict';
import test from 'node:test';
import { ConfigurationError } from '../errors';
import { InMemoryModeStore } from '../testing/inMemoryStores';
import { ModeSelector } from './modeSelector';

test('ModeSelector', async t => {
  await t.test('returns the persisted mode', async () => {
    const selector = new ModeSelector(new InMemoryModeStore('health'));
    assert.equal(await selector.resolve(), 'health');
  });

  await t.test('reads the store on every call', async () => {
    const store = new InMemoryModeStore('cases');
    const selector = new ModeSelector(store);

    assert.equal(await selector.resolve(), 'cases');
    await store.setMode('health');
    assert.equal(await selector.resolve(), 'health');
  });

  await t.test('fails when the mode is unset or unknown', async () => {
    await assert.rejects(new ModeSelector(new InMemoryModeStore(null)).resolve(), /Analysis mode is not set/);
    await assert.rejects(
      new ModeSelector(new InMemoryModeStore('billing')).resolve(),
      (error: unknown) => error instanceof ConfigurationError
        && error.message === 'Analysis mode "billing" is not one of cases, health',
    );
  });

  await t.test('uses the configured default when the stored mode is unusable', async () => {
    const selector = new ModeSelector(new InMemoryModeStore(null), 'cases');
    assert.equal(await selector.resolve(), 'cases');
  });
});
