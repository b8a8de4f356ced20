import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 8080,
      geminiApiKey: undefined,
      geminiModel: 'gemini-2.5-flash',
      embeddingModel: 'gemini-embedding-001',
      oracle: { enabled: true, timeoutMs: 30000, delayMs: 500, maxVerifications: 10 },
      semantic: { threshold: 0.7, discount: 0.8 },
      sampleRows: 5,
      logLevel: 'info'
    });
  });

  it('reads overrides and treats blank values as unset', () => {
    const config = loadConfig({
      PORT: '3000',
      GEMINI_API_KEY: 'test-secret',
      ORACLE_ENABLED: 'false',
      MAX_VERIFICATIONS: '3',
      SEMANTIC_THRESHOLD: ' ',
      LOG_LEVEL: 'debug'
    });

    expect(config.port).toBe(3000);
    expect(config.geminiApiKey).toBe('test-secret');
    expect(config.oracle.enabled).toBe(false);
    expect(config.oracle.maxVerifications).toBe(3);
    expect(config.semantic.threshold).toBe(0.7);
    expect(config.logLevel).toBe('debug');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ SEMANTIC_THRESHOLD: '2' })).toThrow(/^Invalid configuration: SEMANTIC_THRESHOLD/);
    expect(() => loadConfig({ ORACLE_ENABLED: 'maybe' })).toThrow(/ORACLE_ENABLED/);
    expect(() => loadConfig({ ORACLE_TIMEOUT_MS: '3000000000' })).toThrow(/^Invalid configuration: ORACLE_TIMEOUT_MS/);
    expect(loadConfig({ ORACLE_TIMEOUT_MS: '2147483647' }).oracle.timeoutMs).toBe(2_147_483_647);
  });
});
