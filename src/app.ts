// src/app.ts
// Fastify application: observability hooks, CORS, rate limiting, error mapping and routes.
// server.ts starts it; tests drive it through inject().

import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { AppConfig } from './config';
import type { DbAdapter } from './db/types';
import type { ZeroShotClient } from './ai/types';
import {
  createAnalysisPipeline,
  pipelineOptionsFromConfig,
  type AnalysisPipeline,
  type AnalysisPipelineDeps,
} from './analysis/pipeline';
import { AllSectionsFailedError, AnalysisError } from './analysis/errors';
import { AnalysesStore } from './store/analyses';
import { registerObservability, requestIdGenerator, getLogLevel } from './observability';
import { getRequestLogger } from './observability/requestLogger';
import { registerRateLimit } from './middleware/rateLimit';
import { createDocumentRoutes } from './routes/documents';
import { createHealthRoutes } from './routes/health';
import metricsRoutes from './routes/metrics';

export interface AppDeps {
  config: AppConfig;
  db: DbAdapter;
  client: ZeroShotClient;
  /** Extra pipeline wiring (clock, id generator, classify overrides) */
  pipeline?: Omit<AnalysisPipelineDeps, 'client' | 'sink' | 'options'>;
}

export interface App {
  app: FastifyInstance;
  store: AnalysesStore;
  pipeline: AnalysisPipeline;
}

/* ---------- Error mapping ---------- */

const HTTP_ERROR_CODES: Record<number, string> = {
  400: 'invalid_input',
  404: 'not_found',
  406: 'not_acceptable',
  413: 'payload_too_large',
  415: 'unsupported_media_type',
  429: 'rate_limited',
};

/** Status carried by Fastify and plugin errors (the rate limiter throws a plain object) */
function statusCodeOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'statusCode' in err && typeof err.statusCode === 'number') {
    return err.statusCode;
  }
  return undefined;
}

function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req, reply) => {
    const log = getRequestLogger(req);

    if (err instanceof AnalysisError) {
      if (err.status >= 500) log.error({ err }, 'analysis failed');
      else log.info({ code: err.code, message: err.message }, 'request rejected');
      return reply.code(err.status).send({
        error: err.code,
        message: err.message,
        ...(err instanceof AllSectionsFailedError ? { report: err.report } : {}),
      });
    }

    if (err.validation) {
      return reply.code(400).send({ error: 'invalid_input', message: err.message });
    }

    const status = statusCodeOf(err);
    if (status !== undefined && status >= 400 && status < 500) {
      return reply.code(status).send({
        error: HTTP_ERROR_CODES[status] ?? 'request_error',
        message: err.message,
      });
    }

    log.error({ err }, 'unhandled error');
    return reply.code(500).send({ error: 'internal_error', message: 'Internal server error' });
  });

  app.setNotFoundHandler((req, reply) => {
    return reply.code(404).send({ error: 'not_found', message: `Route ${req.method} ${req.url} not found` });
  });
}

/* ---------- Factory ---------- */

export async function createApp(deps: AppDeps): Promise<App> {
  const { config, db, client } = deps;

  const app = Fastify({
    logger: { level: getLogLevel() },
    disableRequestLogging: true,
    genReqId: requestIdGenerator,
    bodyLimit: config.upload.maxBytes,
  });

  registerObservability(app);
  registerErrorHandler(app);

  await app.register(cors, { origin: config.cors.origins });

  // Must come before the routes that opt in
  await registerRateLimit(app);

  const store = new AnalysesStore(db);
  const pipeline = createAnalysisPipeline({
    ...deps.pipeline,
    client,
    sink: store,
    options: pipelineOptionsFromConfig(config),
  });

  await app.register(createDocumentRoutes({ pipeline, store, upload: config.upload }));
  await app.register(createHealthRoutes({ db, classifier: client }));
  await app.register(metricsRoutes);

  return { app, store, pipeline };
}
