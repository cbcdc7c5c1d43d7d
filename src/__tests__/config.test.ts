import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { loadConfig } from '../config';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const cfg = loadConfig({});

    expect(cfg.server).toEqual({ port: 4000, host: '0.0.0.0' });
    expect(cfg.database.path).toBe(path.resolve(process.cwd(), 'data/db/analyses.db'));
    expect(cfg.ai.provider).toBe('dev');
    expect(cfg.classifier).toEqual({
      labels: { compliant: 'compliant', nonCompliant: 'non-compliant' },
      hypothesisTemplate: 'This document is {}.',
      timeoutMs: 30_000,
      maxAttempts: 3,
      baseDelayMs: 500,
      maxDelayMs: 8_000,
      maxElapsedMs: 90_000,
      concurrency: 4,
    });
    expect(cfg.pipeline).toEqual({
      maxSectionLength: 1500,
      highRiskThreshold: 0.75,
      mediumRiskThreshold: 0.4,
      previewLength: 150,
    });
    expect(cfg.upload).toEqual({ maxBytes: 10 * 1024 * 1024, maxBatchFiles: 10, maxBulkDelete: 50 });
  });

  it('reads overrides and trims values', () => {
    const cfg = loadConfig({
      PORT: ' 8080 ',
      AI_PROVIDER: 'OpenAI',
      OPENAI_API_KEY: 'test-secret',
      CORS_ORIGINS: 'http://a.test, http://b.test,',
      HIGH_RISK_THRESHOLD: '0.9',
      CLASSIFIER_CONCURRENCY: '8',
    });

    expect(cfg.server.port).toBe(8080);
    expect(cfg.ai.provider).toBe('openai');
    expect(cfg.ai.openai.apiKey).toBe('test-secret');
    expect(cfg.cors.origins).toEqual(['http://a.test', 'http://b.test']);
    expect(cfg.pipeline.highRiskThreshold).toBe(0.9);
    expect(cfg.classifier.concurrency).toBe(8);
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ PORT: '  ', MAX_SECTION_LENGTH: '' }).pipeline.maxSectionLength).toBe(1500);
  });

  it('rejects malformed integers', () => {
    expect(() => loadConfig({ MAX_SECTION_LENGTH: '12.5' })).toThrow(
      'MAX_SECTION_LENGTH must be an integer >= 1 (got "12.5")'
    );
    expect(() => loadConfig({ CLASSIFIER_MAX_ATTEMPTS: '0' })).toThrow(
      'CLASSIFIER_MAX_ATTEMPTS must be an integer >= 1 (got "0")'
    );
  });

  it('rejects thresholds outside [0, 1] or out of order', () => {
    expect(() => loadConfig({ HIGH_RISK_THRESHOLD: '1.5' })).toThrow(
      'HIGH_RISK_THRESHOLD must be a number between 0 and 1 (got "1.5")'
    );
    expect(() => loadConfig({ HIGH_RISK_THRESHOLD: '0.3' })).toThrow(
      'MEDIUM_RISK_THRESHOLD must not exceed HIGH_RISK_THRESHOLD'
    );
  });

  it('rejects an unknown provider', () => {
    expect(() => loadConfig({ AI_PROVIDER: 'cohere' })).toThrow(
      'AI_PROVIDER must be one of dev, huggingface, openai, anthropic (got "cohere")'
    );
  });
});
