import { describe, expect, it } from 'vitest';
import { loadConfig } from '..';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.env).toBe('development');
    expect(config.timeZone).toBe('America/Bogota');
    expect(config.inference).toEqual({
      enabled: true,
      baseUrl: 'http://localhost:11434/v1',
      apiKey: 'ollama',
      model: 'llama3.2:3b',
    });
    expect(config.interpreter).toMatchObject({
      timeoutMs: 90_000,
      maxRetries: 2,
      baseDelayMs: 2_000,
      acceptConfidence: 0.6,
    });
    expect(config.cache).toEqual({ ttlMs: 3_600_000, maxEntries: 1_000, retainRatio: 0.8 });
    expect(config.queue).toEqual({
      concurrency: 2,
      resultTtlMs: 3_600_000,
      maxImageBytes: 10 * 1024 * 1024,
    });
    expect(config.storage).toEqual({
      supabaseUrl: undefined,
      supabaseKey: undefined,
      table: 'transactions',
    });
  });

  it('converts seconds and megabytes from the environment', () => {
    const config = loadConfig({
      CACHE_TTL_SECONDS: '60',
      TASK_RESULT_TTL_SECONDS: '120',
      METRICS_WINDOW_SECONDS: '30',
      MAX_IMAGE_SIZE_MB: '2',
      QUEUE_CONCURRENCY: '4',
      INFERENCE_ENABLED: 'false',
    });

    expect(config.cache.ttlMs).toBe(60_000);
    expect(config.queue).toEqual({
      concurrency: 4,
      resultTtlMs: 120_000,
      maxImageBytes: 2 * 1024 * 1024,
    });
    expect(config.metrics.windowMs).toBe(30_000);
    expect(config.inference.enabled).toBe(false);
  });

  it.each([
    ['QUEUE_CONCURRENCY', '0'],
    ['ACCEPT_CONFIDENCE', '1.5'],
    ['INFERENCE_BASE_URL', 'not a url'],
    ['INFERENCE_ENABLED', 'maybe'],
    ['LOG_LEVEL', 'verbose'],
  ])('rejects %s=%s', (key, value) => {
    expect(() => loadConfig({ [key]: value })).toThrow();
  });
});
