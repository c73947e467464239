import { describe, expect, it } from 'vitest';
import { loadAppConfig } from '@/config/app.config';
import { configureLogger, logger } from '@/services/logger';

describe('loadAppConfig', () => {
  it('applies defaults', () => {
    const config = loadAppConfig({});

    expect(config.port).toBe(4000);
    expect(config.nodeEnv).toBe('development');
    expect(config.openai).toEqual({ apiKey: undefined, model: 'gpt-4.1-mini' });
    expect(config.retrieval).toEqual({
      liveApiTimeoutMs: 8000,
      liveApiMaxRetries: 2,
      generativeTimeoutMs: 20000,
      cacheTtlSeconds: 900,
    });
    expect(config.orchestration).toEqual({ independentDeadlineMs: 45000, runDeadlineMs: 90000 });
    expect(config.verification.budgetTolerance).toBe(0.1);
  });

  it('coerces numbers and treats blank keys as absent', () => {
    const config = loadAppConfig({ PORT: '8080', OPENAI_API_KEY: '   ', BUDGET_TOLERANCE: '0.25' });

    expect(config.port).toBe(8080);
    expect(config.openai.apiKey).toBeUndefined();
    expect(config.verification.budgetTolerance).toBe(0.25);
  });

  it('names the offending variable', () => {
    expect(() => loadAppConfig({ PORT: 'abc' })).toThrow(/^Invalid environment configuration: PORT: /);
    expect(() => loadAppConfig({ LIVE_API_MAX_RETRIES: '9' })).toThrow(/LIVE_API_MAX_RETRIES/);
  });
});

describe('configureLogger', () => {
  it('applies the configured log level', () => {
    const config = loadAppConfig({ NODE_ENV: 'test', LOG_LEVEL: 'warn' });
    configureLogger(config);

    expect(config.logLevel).toBe('warn');
    expect(logger.settings.minLevel).toBe(4);
    expect(logger.settings.type).toBe('hidden');

    configureLogger({ logLevel: 'info', nodeEnv: 'test' });
    expect(logger.settings.minLevel).toBe(3);
  });

  it('rejects an unknown level', () => {
    expect(() => loadAppConfig({ LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/);
  });
});
