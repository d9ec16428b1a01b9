import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { config } from './config';
import type { DedupIndex } from './services/dataset';
import type { LensCatalog } from './services/lenses';
import type { RunOptions } from './services/pipeline';
import type { RunReportStore } from './utils/db';
import type { ConcurrencyLimiter } from './utils/limiter';
import type { GenerationClient } from './utils/llm';
import { healthRoutes, type ReadinessCheck } from './routes/health';
import { lensRoutes } from './routes/lenses';
import { runRoutes } from './routes/runs';

export interface ServerDeps {
  client: GenerationClient;
  catalog: LensCatalog;
  limiter: ConcurrencyLimiter;
  defaults: RunOptions;
  outputDir: string;
  dedupIndex?: DedupIndex;
  reportStore?: RunReportStore;
  readiness?: Record<string, ReadinessCheck>;
}

export interface ServerOptions {
  logger?: boolean;
}

export async function buildServer(deps: ServerDeps, options: ServerOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger === false ? false : { level: config.logLevel },
    requestIdLogLabel: 'reqId',
    requestIdHeader: 'x-request-id',
    bodyLimit: 50 * 1024 * 1024, // documents are posted inline
  });

  // Register plugins
  await fastify.register(helmet, {
    contentSecurityPolicy: false,
  });

  await fastify.register(cors, {
    origin: [...config.corsOrigins],
    credentials: true,
  });

  // Register routes
  await fastify.register(healthRoutes, { prefix: '/health', checks: deps.readiness ?? {} });
  await fastify.register(lensRoutes, { prefix: '/api/v1/lenses', catalog: deps.catalog });
  await fastify.register(runRoutes, {
    prefix: '/api/v1/runs',
    client: deps.client,
    catalog: deps.catalog,
    limiter: deps.limiter,
    defaults: deps.defaults,
    outputDir: deps.outputDir,
    dedupIndex: deps.dedupIndex,
    reportStore: deps.reportStore,
  });

  return fastify;
}
