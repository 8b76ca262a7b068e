import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { resolveSettings, DEFAULT_MODEL_CONFIG } from '../config.js';
import { ConfigError } from '../errors.js';

describe('resolveSettings', () => {
  it('falls back to defaults', () => {
    assert.deepEqual(resolveSettings({}, {}), {
      modelConfig: DEFAULT_MODEL_CONFIG,
      maxRevisions: 2,
    });
  });

  it('reads and coerces the environment', () => {
    const settings = resolveSettings(
      {},
      {
        ASKDB_MODEL: 'test-model',
        ASKDB_TEMPERATURE: '0.5',
        ASKDB_MAX_OUTPUT_TOKENS: '512',
        ASKDB_MAX_REVISIONS: '4',
      },
    );
    assert.deepEqual(settings, {
      modelConfig: { model: 'test-model', temperature: 0.5, maxOutputTokens: 512 },
      maxRevisions: 4,
    });
  });

  it('lets overrides win over the environment', () => {
    const settings = resolveSettings({ model: 'override-model', maxRevisions: '0' }, { ASKDB_MODEL: 'env-model' });
    assert.equal(settings.modelConfig.model, 'override-model');
    assert.equal(settings.maxRevisions, 0);
  });

  it('treats empty values as unset', () => {
    const settings = resolveSettings({ model: '' }, { ASKDB_MODEL: '', ASKDB_TEMPERATURE: '' });
    assert.equal(settings.modelConfig.model, DEFAULT_MODEL_CONFIG.model);
    assert.equal(settings.modelConfig.temperature, DEFAULT_MODEL_CONFIG.temperature);
  });

  it('rejects out-of-range values', () => {
    assert.throws(
      () => resolveSettings({ temperature: 3 }, {}),
      (err: unknown) => err instanceof ConfigError && err.message === 'Invalid settings: temperature: must be <= 2',
    );
  });

  it('rejects a negative or fractional revision count', () => {
    assert.throws(() => resolveSettings({ maxRevisions: -1 }, {}), ConfigError);
    assert.throws(() => resolveSettings({ maxRevisions: '1.5' }, {}), /maxRevisions: must be integer/);
  });

  it('reports every invalid value at once', () => {
    assert.throws(
      () => resolveSettings({}, { ASKDB_TEMPERATURE: 'warm', ASKDB_MAX_OUTPUT_TOKENS: '0' }),
      (err: unknown) =>
        err instanceof ConfigError &&
        err.message === 'Invalid settings: temperature: must be number; maxOutputTokens: must be >= 1',
    );
  });
});
