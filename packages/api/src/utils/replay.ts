import { appendFile, mkdir, readFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { sha256, type GenerationRequest } from '@groundwork/shared';
import { ConfigError, GenerationError, getErrorMessage } from './errors';
import { Mutex } from './limiter';
import type { CallOptions, GenerationClient } from './llm';
import { logger } from './logger';

/**
 * Record / replay of backend responses.
 *
 * A cassette is JSONL: one recorded outcome per line, keyed by a hash of
 * everything the backend sees (system, examples, prefill, prompt, params).
 * Outcomes for the same key are served in recorded order; the last one
 * repeats once the rest are used up.
 */

const CassetteEntrySchema = z.object({
  key: z.string(),
  lensName: z.string(),
  sourceId: z.string(),
  chunkIndex: z.number().int().nonnegative(),
  response: z.string().optional(),
  error: z.enum(['Timeout', 'RateLimited', 'BackendUnavailable', 'AuthError']).optional(),
});

export type CassetteEntry = z.infer<typeof CassetteEntrySchema>;

export function requestKey(request: GenerationRequest): string {
  return sha256(
    JSON.stringify({
      system: request.system ?? null,
      examples: request.examples ?? [],
      prefill: request.prefill ?? null,
      prompt: request.prompt,
      params: request.params,
    })
  );
}

/**
 * Parse cassette text. Line numbers in errors count every line, blank ones included.
 */
export function parseCassette(text: string, source = 'cassette'): CassetteEntry[] {
  const entries: CassetteEntry[] = [];

  text.split('\n').forEach((line, i) => {
    if (line.trim() === '') {
      return;
    }
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (error) {
      throw new ConfigError(`Invalid JSON on line ${i + 1} of ${source}: ${getErrorMessage(error)}`, { cause: error });
    }
    const parsed = CassetteEntrySchema.safeParse(json);
    if (!parsed.success) {
      throw new ConfigError(`Invalid cassette entry on line ${i + 1} of ${source}`);
    }
    entries.push(parsed.data);
  });

  return entries;
}

export class ReplayClient implements GenerationClient {
  readonly name = 'replay';
  private readonly outcomes = new Map<string, CassetteEntry[]>();
  private readonly served = new Map<string, number>();

  constructor(entries: readonly CassetteEntry[]) {
    for (const entry of entries) {
      const list = this.outcomes.get(entry.key) ?? [];
      list.push(entry);
      this.outcomes.set(entry.key, list);
    }
  }

  static async fromFile(path: string): Promise<ReplayClient> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      throw new ConfigError(`Cannot read cassette ${path}: ${getErrorMessage(error)}`, { cause: error });
    }
    return new ReplayClient(parseCassette(text, path));
  }

  async generate(request: GenerationRequest, options: CallOptions): Promise<string> {
    options.signal?.throwIfAborted();

    const key = requestKey(request);
    const list = this.outcomes.get(key);
    if (!list || list.length === 0) {
      throw new GenerationError(
        'BackendUnavailable',
        `No recorded response for ${request.sourceId}#${request.chunkIndex} (${request.lensName})`
      );
    }

    const count = this.served.get(key) ?? 0;
    this.served.set(key, count + 1);
    const entry = list[Math.min(count, list.length - 1)];

    if (entry.error) {
      throw new GenerationError(entry.error, `Replayed ${entry.error}`);
    }
    return entry.response ?? '';
  }
}

/**
 * Where a RecordingClient puts captured entries.
 */
export interface CassetteSink {
  append(entry: CassetteEntry): Promise<void>;
}

export class MemoryCassette implements CassetteSink {
  readonly entries: CassetteEntry[] = [];

  async append(entry: CassetteEntry): Promise<void> {
    this.entries.push(entry);
  }
}

/**
 * Appends every entry to a JSONL file as soon as it is captured.
 */
export class FileCassette implements CassetteSink {
  private readonly mutex = new Mutex();
  private ready?: Promise<unknown>;

  constructor(readonly path: string) {}

  append(entry: CassetteEntry): Promise<void> {
    return this.mutex.runExclusive(async () => {
      this.ready ??= mkdir(dirname(this.path), { recursive: true });
      await this.ready;
      await appendFile(this.path, `${JSON.stringify(entry)}\n`, 'utf8');
    });
  }
}

/**
 * Wraps a live client and records every outcome it sees.
 */
export class RecordingClient implements GenerationClient {
  readonly name: string;

  constructor(
    private readonly inner: GenerationClient,
    private readonly sink: CassetteSink
  ) {
    this.name = `recording(${inner.name})`;
  }

  async generate(request: GenerationRequest, options: CallOptions): Promise<string> {
    const base = {
      key: requestKey(request),
      lensName: request.lensName,
      sourceId: request.sourceId,
      chunkIndex: request.chunkIndex,
    };
    try {
      const response = await this.inner.generate(request, options);
      await this.capture({ ...base, response });
      return response;
    } catch (error) {
      if (error instanceof GenerationError) {
        await this.capture({ ...base, error: error.kind });
      }
      throw error;
    }
  }

  private async capture(entry: CassetteEntry): Promise<void> {
    try {
      await this.sink.append(entry);
    } catch (error) {
      // The live response is still good; only the recording is incomplete
      logger.warn({ key: entry.key, error: getErrorMessage(error) }, 'Failed to record cassette entry');
    }
  }
}
