/* apps/http/test/config.spec.ts */
import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 4000,
      host: '0.0.0.0',
      logLevel: 'info',
      bodyLimit: 1_000_000,
      corsOrigins: [],
      rateLimitMax: 600,
      maxRows: 50_000,
      maxSteps: 64,
      csvPreviewRows: 20,
      debugErrors: false
    });
  });

  it('reads and coerces variables', () => {
    const cfg = loadConfig({ PORT: '8080', CORS_ORIGIN: 'http://a.test, http://b.test,', MAX_STEPS: '10', DEBUG_ERRORS: '1' });
    expect(cfg.port).toBe(8080);
    expect(cfg.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
    expect(cfg.maxSteps).toBe(10);
    expect(cfg.debugErrors).toBe(true);
  });

  it('treats empty variables as unset', () => {
    expect(loadConfig({ PORT: '', LOG_LEVEL: '' }).port).toBe(4000);
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ MAX_ROWS: 'lots' })).toThrow(ZodError);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(ZodError);
  });
});
