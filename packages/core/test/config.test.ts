import { describe, expect, it } from 'vitest';

import { loadEngineConfig } from '../src/config.js';

describe('loadEngineConfig', () => {
  it('applies defaults', () => {
    expect(loadEngineConfig({})).toEqual({
      maxConcurrency: 2,
      maxQueueSize: undefined,
      runTimeoutMs: 60_000,
      hardTimeoutGraceMs: 5_000,
      actionTimeoutMs: 5_000,
      seed: 1,
      recentFailures: 20,
      aiProvider: 'none',
      aiTimeoutMs: 10_000,
      artifactsRoot: 'runs',
      headless: true,
      logLevel: 'info',
      port: 4000
    });
  });

  it('coerces numbers and booleans from strings', () => {
    const config = loadEngineConfig({
      FORMPROBE_MAX_CONCURRENCY: '4',
      FORMPROBE_MAX_QUEUE: '0',
      FORMPROBE_HEADLESS: 'no',
      FORMPROBE_AI_PROVIDER: 'openai',
      PORT: '8080'
    });

    expect(config.maxConcurrency).toBe(4);
    expect(config.maxQueueSize).toBe(0);
    expect(config.headless).toBe(false);
    expect(config.aiProvider).toBe('openai');
    expect(config.port).toBe(8080);
  });

  it('treats empty strings as unset', () => {
    expect(loadEngineConfig({ FORMPROBE_SEED: '', FORMPROBE_ARTIFACTS_ROOT: '' })).toMatchObject({
      seed: 1,
      artifactsRoot: 'runs'
    });
  });

  it('names the offending variable', () => {
    expect(() => loadEngineConfig({ FORMPROBE_MAX_CONCURRENCY: 'zero' })).toThrow(
      /^Invalid configuration: FORMPROBE_MAX_CONCURRENCY: /
    );
    expect(() => loadEngineConfig({ FORMPROBE_AI_PROVIDER: 'mock' })).toThrow(/FORMPROBE_AI_PROVIDER/);
  });
});
