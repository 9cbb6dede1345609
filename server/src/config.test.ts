import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig({});

    expect(config.port).toBe(8787);
    expect(config.busyTimeoutMs).toBe(5000);
    expect(config.retry).toEqual({ attempts: 6, baseDelayMs: 80 });
    expect(path.basename(config.databasePath)).toBe('ledger.db');
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '9000',
      DATABASE_PATH: '/tmp/test-ledger.db',
      DB_BUSY_TIMEOUT_MS: '250',
      DB_RETRY_ATTEMPTS: '2',
      DB_RETRY_BASE_MS: '10',
    });

    expect(config).toEqual({
      port: 9000,
      databasePath: '/tmp/test-ledger.db',
      busyTimeoutMs: 250,
      retry: { attempts: 2, baseDelayMs: 10 },
    });
  });

  it('names the variable that failed', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/^Invalid environment: PORT: /);
    expect(() => loadConfig({ DB_RETRY_ATTEMPTS: '0' })).toThrow(/DB_RETRY_ATTEMPTS/);
  });
});
