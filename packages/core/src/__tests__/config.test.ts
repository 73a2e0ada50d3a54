import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { loadConfig } from '../config.js';
import { ConfigError } from '../errors.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    assert.deepEqual(loadConfig({}), {
      dbPath: 'data/banking.db',
      model: 'gpt-4o-mini',
      temperature: 0.1,
      maxTokens: 1000,
      oracleTimeoutMs: 30000,
      generationRetries: 1,
      maxRows: 5000,
      statementTimeoutMs: 15000,
      chartRowThreshold: 500,
      logLevel: 'warn',
      screenIntent: false,
    });
  });

  it('coerces numeric and boolean strings', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-secret',
      QUERYGATE_LLM_BASE_URL: 'http://localhost:8080/v1',
      QUERYGATE_TEMPERATURE: '0.5',
      QUERYGATE_MAX_ROWS: '200',
      QUERYGATE_SCREEN_INTENT: 'true',
      QUERYGATE_LOG_LEVEL: 'debug',
    });
    assert.equal(config.openaiApiKey, 'test-secret');
    assert.equal(config.llmBaseUrl, 'http://localhost:8080/v1');
    assert.equal(config.temperature, 0.5);
    assert.equal(config.maxRows, 200);
    assert.equal(config.screenIntent, true);
    assert.equal(config.logLevel, 'debug');
  });

  it('treats blank variables as unset', () => {
    assert.equal(loadConfig({ QUERYGATE_MODEL: '   ' }).model, 'gpt-4o-mini');
  });

  it('lists every invalid variable', () => {
    assert.throws(
      () =>
        loadConfig({
          QUERYGATE_TEMPERATURE: '1.5',
          QUERYGATE_GENERATION_RETRIES: '3',
          QUERYGATE_MAX_ROWS: 'lots',
          QUERYGATE_LOG_LEVEL: 'loud',
        }),
      (err: unknown) => {
        assert.ok(err instanceof ConfigError);
        assert.equal(err.code, 'ConfigInvalid');
        assert.deepEqual([...err.issues].sort(), [
          'QUERYGATE_GENERATION_RETRIES must be <= 2',
          'QUERYGATE_LOG_LEVEL must be one of fatal, error, warn, info, debug, trace, silent',
          'QUERYGATE_MAX_ROWS must be integer',
          'QUERYGATE_TEMPERATURE must be <= 1',
        ]);
        assert.ok(err.message.startsWith('Invalid configuration:\n  - '));
        return true;
      },
    );
  });
});
