import { describe, it, expect } from 'vitest';
import { loadConfig } from '@/config/env';
import { ConfigError } from '@/errors/chatErrors';

const REQUIRED = { PROVIDER_API_KEY: 'test-key', PROVIDER_MODEL: 'test-model' };

function problemsOf(env: Record<string, string>): string[] {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) return error.problems;
    throw error;
  }
  return [];
}

describe('loadConfig', () => {
  it('should apply defaults when only the required keys are set', () => {
    const config = loadConfig(REQUIRED);

    expect(config.port).toBe(3000);
    expect(config.provider).toEqual({
      apiKey: 'test-key',
      model: 'test-model',
      baseUrl: 'https://openrouter.ai/api',
      timeoutMs: 30_000,
      temperature: 0.7,
    });
    expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 4000 });
    expect(config.retrieval).toEqual({ topK: 1, historyWindow: 10 });
    expect(config.embedding.provider).toBe('local');
    expect(config.transcription.maxBytes).toBe(25 * 1024 * 1024);
    expect(config.session.ttlMs).toBe(1_800_000);
    expect(config.socket).toEqual({ idleTimeoutMs: 60_000, keepaliveMs: 30_000 });
    expect(config.corsOrigin).toBeUndefined();
  });

  it('should fail fast listing every missing required key', () => {
    const problems = problemsOf({});

    expect(problems).toHaveLength(2);
    expect(problems[0]).toMatch(/^PROVIDER_API_KEY: /);
    expect(problems[1]).toMatch(/^PROVIDER_MODEL: /);
  });

  it('should treat blank values as missing', () => {
    const problems = problemsOf({ PROVIDER_API_KEY: '   ', PROVIDER_MODEL: 'test-model' });

    expect(problems).toHaveLength(1);
    expect(problems[0]).toMatch(/^PROVIDER_API_KEY: /);
  });

  it('should reject out-of-range numbers', () => {
    const problems = problemsOf({ ...REQUIRED, RETRIEVAL_TOP_K: '9', PORT: 'abc' });

    expect(problems.map((p) => p.split(':')[0]).sort()).toEqual(['PORT', 'RETRIEVAL_TOP_K']);
  });

  it('should reject a retry cap below the base delay', () => {
    const problems = problemsOf({ ...REQUIRED, PROVIDER_RETRY_BASE_MS: '800', PROVIDER_RETRY_MAX_MS: '100' });

    expect(problems).toEqual(['PROVIDER_RETRY_MAX_MS: must be >= PROVIDER_RETRY_BASE_MS']);
  });

  it('should default embedding and transcription keys to the provider key', () => {
    const config = loadConfig({ ...REQUIRED, TRANSCRIPTION_API_KEY: 'speech-key' });

    expect(config.embedding.apiKey).toBe('test-key');
    expect(config.transcription.apiKey).toBe('speech-key');
  });

  it('should strip trailing slashes from base URLs', () => {
    const config = loadConfig({ ...REQUIRED, PROVIDER_BASE_URL: 'https://provider.test/api/' });

    expect(config.provider.baseUrl).toBe('https://provider.test/api');
  });

  it('should return a frozen value', () => {
    const config = loadConfig(REQUIRED);

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.provider)).toBe(true);
  });
});
