import { join } from 'path';
import { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { generateRunId, type RunResult } from '@groundwork/shared';
import { toExchangeRecord, writeDataset, type DedupIndex } from '../services/dataset';
import type { LensCatalog } from '../services/lenses';
import {
  RunOverridesSchema,
  applyOverrides,
  runPipeline,
  type RunOptions,
} from '../services/pipeline';
import type { RunReportStore } from '../utils/db';
import { ConfigError, RunAbortedError, getErrorMessage } from '../utils/errors';
import type { ConcurrencyLimiter } from '../utils/limiter';
import type { GenerationClient } from '../utils/llm';
import { logger } from '../utils/logger';

const DocumentSchema = z.object({
  id: z.string().min(1).max(200),
  text: z.string(),
  metadata: z
    .object({
      title: z.string().optional(),
      sourceType: z.enum(['book', 'code', 'paper', 'legal', 'transcript', 'other']).optional(),
    })
    .passthrough()
    .optional(),
});

const RunRequestSchema = z.object({
  documents: z.array(DocumentSchema).min(1).max(500),
  options: RunOverridesSchema.optional(),
});

export interface RunRoutesOptions {
  client: GenerationClient;
  catalog: LensCatalog;
  limiter: ConcurrencyLimiter;
  defaults: RunOptions;
  outputDir: string;
  dedupIndex?: DedupIndex;
  reportStore?: RunReportStore;
}

export const runRoutes: FastifyPluginAsync<RunRoutesOptions> = async (fastify, opts) => {
  const persist = async (result: RunResult) => {
    const path = join(opts.outputDir, `${result.report.runId}.jsonl`);
    await writeDataset(path, result.records);

    if (opts.reportStore) {
      try {
        await opts.reportStore.save(result.report);
      } catch (error) {
        // Non-critical: the dataset is already on disk
        logger.warn({ runId: result.report.runId, error: getErrorMessage(error) }, 'Failed to store run report');
      }
    }
    return path;
  };

  /**
   * POST /api/v1/runs
   * Runs the generation pipeline over the posted documents
   *
   * The run is tied to the connection: if the client goes away, in-flight
   * work is cancelled and whatever was accepted so far is still written.
   */
  fastify.post('/', async (request, reply) => {
    const requestId = request.id;

    const validation = RunRequestSchema.safeParse(request.body);
    if (!validation.success) {
      return reply.code(400).send({
        error: 'Invalid request',
        details: validation.error.issues,
      });
    }

    const { documents, options } = validation.data;
    const runId = generateRunId();
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) {
        controller.abort(new Error('Client disconnected'));
      }
    };
    reply.raw.on('close', onClose);

    let result: RunResult;
    try {
      result = await runPipeline(
        documents,
        applyOverrides(opts.defaults, options),
        {
          client: opts.client,
          catalog: opts.catalog,
          limiter: opts.limiter,
          dedupIndex: opts.dedupIndex,
          logger: logger.child({ requestId }),
        },
        { runId, signal: controller.signal }
      );
    } catch (error) {
      if (error instanceof ConfigError) {
        return reply.code(400).send({ error: error.message, requestId });
      }
      if (error instanceof RunAbortedError) {
        const output = await persist(error.result);
        fastify.log.error({ requestId, runId, error: error.message }, 'Generation run aborted');
        return reply.code(502).send({
          error: error.message,
          requestId,
          output,
          report: error.result.report,
        });
      }
      throw error;
    } finally {
      reply.raw.off('close', onClose);
    }

    const output = await persist(result);

    return {
      requestId,
      output,
      report: result.report,
      records: result.records.map(toExchangeRecord),
    };
  });
};
