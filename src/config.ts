/* src/config.ts
   Centralized config: server, storage, classifier policy, pipeline thresholds. */
import path from 'node:path';
import 'dotenv/config';

export type AIProvider = 'dev' | 'huggingface' | 'openai' | 'anthropic';

const AI_PROVIDERS: readonly AIProvider[] = ['dev', 'huggingface', 'openai', 'anthropic'];

type Env = Record<string, string | undefined>;

export interface AppConfig {
  nodeEnv: string;
  server: {
    port: number;
    host: string;
  };
  database: {
    path: string;
  };
  cors: {
    origins: string[];
  };
  ai: {
    provider: AIProvider;
    huggingface: { token: string; baseUrl: string; model: string; maxInputChars: number };
    openai: { apiKey: string; model: string; maxInputChars: number };
    anthropic: { apiKey: string; model: string; maxInputChars: number };
  };
  classifier: {
    labels: { compliant: string; nonCompliant: string };
    hypothesisTemplate: string;
    timeoutMs: number;
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    maxElapsedMs: number;
    concurrency: number;
  };
  pipeline: {
    maxSectionLength: number;
    highRiskThreshold: number;
    mediumRiskThreshold: number;
    previewLength: number;
  };
  upload: {
    maxBytes: number;
    maxBatchFiles: number;
    maxBulkDelete: number;
  };
}

/* ------------------------------ parsing ------------------------------ */

function str(env: Env, name: string, fallback = ''): string {
  const raw = env[name];
  return raw === undefined || raw.trim() === '' ? fallback : raw.trim();
}

function int(env: Env, name: string, fallback: number, min = 0): number {
  const raw = str(env, name);
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new Error(`${name} must be an integer >= ${min} (got "${raw}")`);
  }
  return n;
}

function ratio(env: Env, name: string, fallback: number): number {
  const raw = str(env, name);
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0 || n > 1) {
    throw new Error(`${name} must be a number between 0 and 1 (got "${raw}")`);
  }
  return n;
}

function provider(env: Env): AIProvider {
  const raw = str(env, 'AI_PROVIDER', 'dev').toLowerCase();
  const match = AI_PROVIDERS.find((p) => p === raw);
  if (!match) {
    throw new Error(`AI_PROVIDER must be one of ${AI_PROVIDERS.join(', ')} (got "${raw}")`);
  }
  return match;
}

/* ------------------------------ loader ------------------------------ */

/**
 * Build the application config from an environment map.
 * Throws on malformed numeric values so a bad deploy fails at startup.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const highRiskThreshold = ratio(env, 'HIGH_RISK_THRESHOLD', 0.75);
  const mediumRiskThreshold = ratio(env, 'MEDIUM_RISK_THRESHOLD', 0.4);
  if (mediumRiskThreshold > highRiskThreshold) {
    throw new Error('MEDIUM_RISK_THRESHOLD must not exceed HIGH_RISK_THRESHOLD');
  }

  return {
    nodeEnv: str(env, 'NODE_ENV', 'development'),

    // ── Server ───────────────────────────────────────────────────────
    server: {
      port: int(env, 'PORT', 4000, 1),
      host: str(env, 'HOST', '0.0.0.0'),
    },

    // ── Storage ──────────────────────────────────────────────────────
    database: {
      path: path.resolve(process.cwd(), str(env, 'DATABASE_PATH', 'data/db/analyses.db')),
    },

    cors: {
      origins: str(env, 'CORS_ORIGINS', 'http://localhost:3000')
        .split(',')
        .map((s) => s.trim())
        .filter(Boolean),
    },

    // ── Zero-shot classifier providers ───────────────────────────────
    ai: {
      provider: provider(env),
      huggingface: {
        token: str(env, 'HF_API_TOKEN'),
        baseUrl: str(env, 'HF_BASE_URL', 'https://router.huggingface.co/hf-inference/models'),
        model: str(env, 'HF_MODEL', 'facebook/bart-large-mnli'),
        maxInputChars: int(env, 'HF_MAX_INPUT_CHARS', 2048, 1),
      },
      openai: {
        apiKey: str(env, 'OPENAI_API_KEY'),
        model: str(env, 'AI_MODEL_OPENAI', 'gpt-4o-mini'),
        maxInputChars: int(env, 'OPENAI_MAX_INPUT_CHARS', 8000, 1),
      },
      anthropic: {
        apiKey: str(env, 'ANTHROPIC_API_KEY'),
        model: str(env, 'AI_MODEL_ANTHROPIC', 'claude-3-5-haiku-20241022'),
        maxInputChars: int(env, 'ANTHROPIC_MAX_INPUT_CHARS', 8000, 1),
      },
    },

    // ── Classifier call policy ───────────────────────────────────────
    classifier: {
      labels: {
        compliant: str(env, 'LABEL_COMPLIANT', 'compliant'),
        nonCompliant: str(env, 'LABEL_NON_COMPLIANT', 'non-compliant'),
      },
      hypothesisTemplate: str(env, 'HYPOTHESIS_TEMPLATE', 'This document is {}.'),
      timeoutMs: int(env, 'CLASSIFIER_TIMEOUT_MS', 30_000, 1),
      maxAttempts: int(env, 'CLASSIFIER_MAX_ATTEMPTS', 3, 1),
      baseDelayMs: int(env, 'CLASSIFIER_BASE_DELAY_MS', 500),
      maxDelayMs: int(env, 'CLASSIFIER_MAX_DELAY_MS', 8_000),
      maxElapsedMs: int(env, 'CLASSIFIER_MAX_ELAPSED_MS', 90_000, 1),
      concurrency: int(env, 'CLASSIFIER_CONCURRENCY', 4, 1),
    },

    // ── Segmentation & aggregation ───────────────────────────────────
    pipeline: {
      maxSectionLength: int(env, 'MAX_SECTION_LENGTH', 1500, 1),
      highRiskThreshold,
      mediumRiskThreshold,
      previewLength: int(env, 'PREVIEW_LENGTH', 150, 10),
    },

    upload: {
      maxBytes: int(env, 'UPLOAD_MAX_BYTES', 10 * 1024 * 1024, 1),
      maxBatchFiles: int(env, 'UPLOAD_MAX_BATCH_FILES', 10, 1),
      maxBulkDelete: int(env, 'MAX_BULK_DELETE', 50, 1),
    },
  };
}

export const config: AppConfig = loadConfig();
