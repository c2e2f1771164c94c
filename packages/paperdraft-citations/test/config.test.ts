import { describe, expect, it } from 'vitest';
import { parseConfig } from '../src/config.js';

describe('parseConfig', () => {
  it('applies overrides on top of defaults', () => {
    const config = parseConfig({
      NODE_ENV: 'test',
      LOG_LEVEL: 'warn',
      PAPERDRAFT_PORT: '8123',
      PAPERDRAFT_HEALTH_PATH: 'status/',
      PAPERDRAFT_DEFAULT_CITATION_STYLE: 'ieee',
      PAPERDRAFT_API_KEY: ''
    });

    expect(config.nodeEnv).toBe('test');
    expect(config.logLevel).toBe('warn');
    expect(config.port).toBe(8123);
    expect(config.healthPath).toBe('/status');
    expect(config.defaultCitationStyle).toBe('ieee');
    expect(config.apiKey).toBeUndefined();
  });

  it('rejects an unsupported default citation style', () => {
    expect(() => parseConfig({ PAPERDRAFT_DEFAULT_CITATION_STYLE: 'chicago' })).toThrow();
  });

  it('rejects an out-of-range session limit', () => {
    expect(() => parseConfig({ PAPERDRAFT_MAX_SESSIONS: 0 })).toThrow();
  });
});
