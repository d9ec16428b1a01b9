import { z } from 'zod';
import {
  generateRunId,
  type Chunk,
  type DialogueTurn,
  type FailedItem,
  type FailureKind,
  type Lens,
  type Provenance,
  type RunReport,
  type RunResult,
  type SourceDocument,
} from '@groundwork/shared';
import { config } from '../config';
import { ConfigError, GenerationError, ParseError, RunAbortedError, getErrorMessage } from '../utils/errors';
import { ConcurrencyLimiter } from '../utils/limiter';
import type { GenerationClient } from '../utils/llm';
import { logger as rootLogger, type Logger } from '../utils/logger';
import { withRetry } from '../utils/retry';
import { assertChunkingOptions, chunkDocument } from './chunker';
import { cleanSource } from './cleaner';
import { composeRequest } from './composer';
import { DatasetAccumulator, comparePositions, type DedupIndex, type Position } from './dataset';
import type { LensCatalog } from './lenses';
import { parseResponse } from './parser';
import { validateTurns } from './validator';

/**
 * Generation Pipeline
 *
 * Documents are cleaned (unless cleanSource is off) and chunked up front.
 *
 * Flow per {chunk, lens} pair:
 * 1. Compose the request from the chunk and lens
 * 2. Call the backend through the shared limiter, retrying transient failures
 * 3. Parse the raw text into turns according to the lens shape
 * 4. Validate, then append to the run's dataset (dedup happens there)
 *
 * Pairs run on a bounded worker pool over an immutable queue. Only the
 * limiter and the dataset accumulator are shared between workers.
 *
 * Failure policy:
 * - ConfigError: thrown before any pair is admitted
 * - AuthError (or any unexpected error): stops the run, RunAbortedError
 *   carries the partial result
 * - everything else: the pair is recorded as failed and skipped
 */

const ParamOverridesSchema = z
  .object({
    temperature: z.number().min(0).max(2).optional(),
    maxOutputTokens: z.number().int().positive().optional(),
    topP: z.number().gt(0).max(1).optional(),
    stop: z.array(z.string().min(1)).max(4).optional(),
  })
  .strict();

const ChunkingSchema = z.object({
  size: z.number().int().positive(),
  overlap: z.number().int().nonnegative(),
  boundary: z.enum(['none', 'sentence', 'paragraph']),
});

const RetrySchema = z.object({
  maxAttempts: z.number().int().min(1).max(10),
  baseDelayMs: z.number().int().nonnegative(),
  maxDelayMs: z.number().int().nonnegative(),
});

export const RunOptionsSchema = z.object({
  lenses: z.array(z.string().min(1)).min(1),
  chunking: ChunkingSchema,
  params: ParamOverridesSchema.default({}),
  workers: z.number().int().min(1).max(64),
  timeoutMs: z.number().int().positive(),
  retry: RetrySchema,
  minRecordLength: z.number().int().nonnegative(),
  cleanSource: z.boolean().default(true),
});

export type RunOptions = z.infer<typeof RunOptionsSchema>;

/**
 * Per-request overrides of the configured run options.
 */
export const RunOverridesSchema = z
  .object({
    lenses: z.array(z.string().min(1)).min(1).optional(),
    chunking: ChunkingSchema.partial().optional(),
    params: ParamOverridesSchema.optional(),
    workers: z.number().int().min(1).max(64).optional(),
    timeoutMs: z.number().int().positive().optional(),
    retry: RetrySchema.partial().optional(),
    minRecordLength: z.number().int().nonnegative().optional(),
    cleanSource: z.boolean().optional(),
  })
  .strict();

export type RunOverrides = z.infer<typeof RunOverridesSchema>;

export function resolveRunOptions(input: unknown): RunOptions {
  const parsed = RunOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid run options: ${issues.join('; ')}`);
  }
  assertChunkingOptions(parsed.data.chunking);

  const seen = new Set<string>();
  for (const name of parsed.data.lenses) {
    if (seen.has(name)) {
      throw new ConfigError(`Lens "${name}" is listed twice`);
    }
    seen.add(name);
  }
  return parsed.data;
}

export function applyOverrides(base: RunOptions, overrides: RunOverrides = {}): RunOptions {
  return resolveRunOptions({
    lenses: overrides.lenses ?? base.lenses,
    chunking: { ...base.chunking, ...overrides.chunking },
    params: { ...base.params, ...overrides.params },
    workers: overrides.workers ?? base.workers,
    timeoutMs: overrides.timeoutMs ?? base.timeoutMs,
    retry: { ...base.retry, ...overrides.retry },
    minRecordLength: overrides.minRecordLength ?? base.minRecordLength,
    cleanSource: overrides.cleanSource ?? base.cleanSource,
  });
}

export function defaultRunOptions(): RunOptions {
  const { pipeline, generation } = config;
  return resolveRunOptions({
    lenses: pipeline.lenses,
    chunking: { size: pipeline.chunkSize, overlap: pipeline.chunkOverlap, boundary: pipeline.boundary },
    params: {
      ...(generation.temperature !== undefined && { temperature: generation.temperature }),
      ...(generation.maxOutputTokens !== undefined && { maxOutputTokens: generation.maxOutputTokens }),
    },
    workers: pipeline.workers,
    timeoutMs: generation.timeoutMs,
    retry: pipeline.retry,
    minRecordLength: pipeline.minRecordLength,
    cleanSource: pipeline.cleanSource,
  });
}

export interface PipelineDeps {
  client: GenerationClient;
  catalog: LensCatalog;
  limiter?: ConcurrencyLimiter; // share one to cap calls across runs
  dedupIndex?: DedupIndex;
  logger?: Logger;
}

export interface RunControl {
  runId?: string;
  signal?: AbortSignal;
}

interface WorkItem {
  chunk: Chunk;
  lens: Lens;
  title: string;
  position: Position;
}

export async function runPipeline(
  documents: readonly SourceDocument[],
  options: RunOptions,
  deps: PipelineDeps,
  control: RunControl = {}
): Promise<RunResult> {
  const runId = control.runId ?? generateRunId();
  const log = (deps.logger ?? rootLogger).child({ runId });
  const startedAt = new Date().toISOString();

  // ===== CONFIGURATION: everything fatal is checked before work starts =====
  const resolved = resolveRunOptions(options);
  const lenses = deps.catalog.resolve(resolved.lenses);
  const ids = new Set<string>();
  for (const document of documents) {
    if (ids.has(document.id)) {
      throw new ConfigError(`Duplicate document id: "${document.id}"`);
    }
    ids.add(document.id);
  }

  // ===== WORK QUEUE =====
  const queue: WorkItem[] = [];
  let chunkCount = 0;
  let skippedChunks = 0;

  documents.forEach((document, d) => {
    const title = document.metadata?.title ?? document.id;
    const source = resolved.cleanSource ? { ...document, text: cleanSource(document.text) } : document;
    for (const chunk of chunkDocument(source, resolved.chunking)) {
      chunkCount++;
      if (chunk.text.trim() === '') {
        skippedChunks++;
        continue;
      }
      lenses.forEach((lens, l) => queue.push({ chunk, lens, title, position: [d, chunk.index, l] }));
    }
  });
  Object.freeze(queue);

  log.info(
    { documents: documents.length, chunks: chunkCount, workItems: queue.length, lenses: resolved.lenses },
    'Generation run started'
  );

  // ===== SHARED STATE =====
  const limiter = deps.limiter ?? new ConcurrencyLimiter(resolved.workers);
  const accumulator = new DatasetAccumulator({ dedupIndex: deps.dedupIndex, logger: log });
  const controller = new AbortController();
  const onAbort = () => controller.abort(control.signal?.reason);
  if (control.signal?.aborted) {
    onAbort();
  } else {
    control.signal?.addEventListener('abort', onAbort, { once: true });
  }

  let cursor = 0;
  let admitted = 0;
  let inFlightCancelled = 0;
  let retries = 0;
  let fatal: unknown;
  const failures: Partial<Record<FailureKind, number>> = {};
  const failed: Array<FailedItem & { position: Position }> = [];

  const recordFailure = (item: WorkItem, stage: FailedItem['stage'], kind: FailureKind, message: string) => {
    failures[kind] = (failures[kind] ?? 0) + 1;
    failed.push({ provenance: provenanceOf(item), stage, kind, message, position: item.position });
    log.warn({ ...provenanceOf(item), stage, kind, message }, 'Work item failed');
  };

  const processItem = async (item: WorkItem): Promise<void> => {
    const provenance = provenanceOf(item);
    const request = composeRequest(item.chunk, item.lens, resolved.params, { title: item.title });

    // ===== GENERATION =====
    let raw: string;
    try {
      raw = await withRetry(
        () =>
          limiter.run(
            () => deps.client.generate(request, { timeoutMs: resolved.timeoutMs, signal: controller.signal }),
            controller.signal
          ),
        resolved.retry,
        {
          signal: controller.signal,
          onRetry: ({ attempt, delayMs, error }) => {
            retries++;
            log.info({ ...provenance, attempt, delayMs, kind: error.kind }, 'Retrying generation');
          },
        }
      );
    } catch (error) {
      if (error instanceof GenerationError && error.kind === 'AuthError') {
        fatal ??= error;
        log.error({ ...provenance, error: error.message }, 'Authentication failed, aborting run');
        controller.abort(error);
        return;
      }
      if (controller.signal.aborted) {
        inFlightCancelled++;
        return;
      }
      if (error instanceof GenerationError && error.kind !== 'AuthError') {
        recordFailure(item, 'generation', error.kind, error.message);
        return;
      }
      throw error;
    }

    // ===== PARSING =====
    let turns: DialogueTurn[];
    try {
      turns = parseResponse(raw, item.lens);
    } catch (error) {
      if (error instanceof ParseError) {
        recordFailure(item, 'parse', error.reason, error.message);
        return;
      }
      throw error;
    }

    // ===== VALIDATION & DEDUP =====
    const outcome = validateTurns(turns, provenance, { minTotalLength: resolved.minRecordLength });
    if (!outcome.ok) {
      recordFailure(item, 'validation', outcome.error.reason, outcome.error.message);
      return;
    }
    await accumulator.append({ record: outcome.record, position: item.position });
  };

  const worker = async (): Promise<void> => {
    while (!controller.signal.aborted && cursor < queue.length) {
      const item = queue[cursor++];
      admitted++;
      try {
        await processItem(item);
      } catch (error) {
        fatal ??= error;
        log.error({ ...provenanceOf(item), error: getErrorMessage(error) }, 'Unexpected failure, aborting run');
        controller.abort(error);
      }
    }
  };

  try {
    await Promise.all(Array.from({ length: Math.min(resolved.workers, queue.length) }, worker));
  } finally {
    control.signal?.removeEventListener('abort', onAbort);
  }

  // ===== REPORT =====
  const records = accumulator.records();
  const report: RunReport = {
    runId,
    status: fatal !== undefined ? 'aborted' : controller.signal.aborted ? 'cancelled' : 'completed',
    startedAt,
    finishedAt: new Date().toISOString(),
    documents: documents.length,
    chunks: chunkCount,
    skippedChunks,
    workItems: queue.length,
    admitted,
    accepted: records.length,
    duplicates: accumulator.duplicates,
    cancelled: inFlightCancelled + (queue.length - admitted),
    retries,
    failures,
    failed: failed
      .sort((a, b) => comparePositions(a.position, b.position))
      .map(({ position: _position, ...item }) => item),
  };

  log.info(
    {
      status: report.status,
      accepted: report.accepted,
      duplicates: report.duplicates,
      failures: report.failures,
      retries: report.retries,
      cancelled: report.cancelled,
    },
    'Generation run finished'
  );

  if (fatal !== undefined) {
    throw new RunAbortedError(`Run ${runId} aborted: ${getErrorMessage(fatal)}`, { report, records }, { cause: fatal });
  }
  return { report, records };
}

function provenanceOf(item: WorkItem): Provenance {
  return { sourceId: item.chunk.sourceId, chunkIndex: item.chunk.index, lensName: item.lens.name };
}
