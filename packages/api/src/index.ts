import { config } from './config';
import { logger } from './utils/logger';
import { buildServer } from './server';
import { createDefaultCatalog, loadLensFile } from './services/lenses';
import { defaultRunOptions } from './services/pipeline';
import type { DedupIndex } from './services/dataset';
import { createSql, checkDatabaseHealth, PostgresRunReportStore, type RunReportStore, type Sql } from './utils/db';
import { ConcurrencyLimiter } from './utils/limiter';
import { createGenerationClient, type GenerationClient } from './utils/llm';
import { createRedis, checkRedisHealth, RedisDedupIndex } from './utils/redis';
import { FileCassette, RecordingClient, ReplayClient } from './utils/replay';
import type { ReadinessCheck } from './routes/health';
import type Redis from 'ioredis';
import type { FastifyInstance } from 'fastify';

let fastify: FastifyInstance | undefined;
let sql: Sql | undefined;
let redis: Redis | undefined;

async function createClient(): Promise<GenerationClient> {
  const { generation } = config;
  if (generation.replayFile) {
    logger.info({ cassette: generation.replayFile }, 'Replaying recorded responses');
    return ReplayClient.fromFile(generation.replayFile);
  }

  const client = createGenerationClient(generation);
  logger.info({ provider: client.name, model: generation[generation.provider].model }, 'Generation backend configured');

  if (generation.recordFile) {
    logger.info({ cassette: generation.recordFile }, 'Recording backend responses');
    return new RecordingClient(client, new FileCassette(generation.recordFile));
  }
  return client;
}

async function start() {
  try {
    // Fail fast on configuration: bad run options, lens file or missing key
    const defaults = defaultRunOptions();
    const catalog = config.pipeline.lensFile
      ? await loadLensFile(config.pipeline.lensFile)
      : createDefaultCatalog();
    catalog.resolve(defaults.lenses);
    const client = await createClient();

    const readiness: Record<string, ReadinessCheck> = {};
    let dedupIndex: DedupIndex | undefined;
    let reportStore: RunReportStore | undefined;

    if (config.redis.dedup) {
      const connection = createRedis(config.redis);
      redis = connection;
      await connection.connect();
      dedupIndex = new RedisDedupIndex(connection, config.redis.dedupPrefix, config.redis.dedupTtlSeconds);
      readiness.redis = () => checkRedisHealth(connection);
    }

    if (config.database.enabled) {
      const connection = createSql(config.database);
      sql = connection;
      reportStore = new PostgresRunReportStore(connection);
      readiness.database = () => checkDatabaseHealth(connection);
    }

    fastify = await buildServer({
      client,
      catalog,
      limiter: new ConcurrencyLimiter(config.pipeline.maxInFlight),
      defaults,
      outputDir: config.pipeline.outputDir,
      dedupIndex,
      reportStore,
      readiness,
    });

    await fastify.listen({
      port: config.port,
      host: config.host,
    });

    logger.info(
      { lenses: catalog.list().map((lens) => lens.name), defaults: defaults.lenses },
      `API server running at http://${config.host}:${config.port}`
    );
  } catch (err) {
    logger.error(err, 'Failed to start server');
    process.exit(1);
  }
}

// Graceful shutdown
const shutdown = async (signal: string) => {
  logger.info(`${signal} received, shutting down gracefully...`);
  try {
    await fastify?.close();
    await sql?.end();
    await redis?.quit();
  } catch (err) {
    logger.error(err, 'Error during shutdown');
    process.exit(1);
  }
  process.exit(0);
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

void start();
