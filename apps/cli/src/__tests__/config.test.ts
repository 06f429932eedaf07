// apps/cli/src/__tests__/config.test.ts
//
// loadConfig: defaults, environment, flag precedence and error reporting.

import { ConfigurationError } from '@bullscows/game-core';

import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({ logLevel: 'info', seed: undefined, json: false });
  });

  it('reads the environment', () => {
    expect(loadConfig({ LOG_LEVEL: 'debug', BULLSCOWS_SEED: 'daily' })).toEqual({
      logLevel: 'debug',
      seed: 'daily',
      json: false,
    });
  });

  it('lets flags override the environment', () => {
    expect(
      loadConfig(
        { LOG_LEVEL: 'debug', BULLSCOWS_SEED: 'daily' },
        { logLevel: 'warn', seed: 'other', json: true },
      ),
    ).toEqual({ logLevel: 'warn', seed: 'other', json: true });
  });

  it('rejects an unknown log level from the environment', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/^Invalid environment: LOG_LEVEL: /);
  });

  it('rejects an unknown log level from flags', () => {
    expect(() => loadConfig({}, { logLevel: 'loud' })).toThrow(/^Invalid options: logLevel: /);
  });

  it('rejects an empty seed', () => {
    expect(() => loadConfig({ BULLSCOWS_SEED: '' })).toThrow(ConfigurationError);
  });
});
