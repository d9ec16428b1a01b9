import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import type { Provenance, TrainingRecord } from '@groundwork/shared';
import { DatasetFormatError, getErrorMessage } from '../utils/errors';
import { Mutex } from '../utils/limiter';
import { logger as rootLogger, type Logger } from '../utils/logger';
import { dedupKey } from './validator';

/**
 * Dataset accumulator and writer.
 *
 * Workers append concurrently; appends are serialized by a mutex. Output
 * order is canonical (document, chunk index, lens order) regardless of
 * completion order, and so is dedup: of two records with the same
 * normalized content, the one later in canonical order is dropped.
 */

/** [document order, chunk index, lens order] */
export type Position = readonly [number, number, number];

export interface Candidate {
  record: TrainingRecord;
  position: Position;
}

/**
 * Dedup index shared across runs. `claim` returns false when the key was
 * already claimed.
 */
export interface DedupIndex {
  claim(key: string): Promise<boolean>;
}

export type AppendOutcome =
  | { status: 'accepted'; key: string; replaced?: Provenance }
  | { status: 'duplicate'; key: string; keptBy: Provenance | 'index' };

interface Entry extends Candidate {
  key: string;
}

export function comparePositions(a: Position, b: Position): number {
  return a[0] - b[0] || a[1] - b[1] || a[2] - b[2];
}

export class DatasetAccumulator {
  private readonly entries = new Map<string, Entry>();
  private readonly mutex = new Mutex();
  private duplicateCount = 0;
  private readonly dedupIndex?: DedupIndex;
  private readonly log: Logger;

  constructor(options: { dedupIndex?: DedupIndex; logger?: Logger } = {}) {
    this.dedupIndex = options.dedupIndex;
    this.log = options.logger ?? rootLogger;
  }

  append(candidate: Candidate): Promise<AppendOutcome> {
    return this.mutex.runExclusive(() => this.appendExclusive(candidate));
  }

  private async appendExclusive(candidate: Candidate): Promise<AppendOutcome> {
    const key = dedupKey(candidate.record.turns);
    const provenance = candidate.record.provenance;
    const holder = this.entries.get(key);

    if (holder) {
      this.duplicateCount++;
      if (comparePositions(candidate.position, holder.position) < 0) {
        this.entries.set(key, { ...candidate, key });
        this.log.info(
          { key, dropped: holder.record.provenance, kept: provenance },
          'Duplicate record dropped'
        );
        return { status: 'accepted', key, replaced: holder.record.provenance };
      }
      this.log.info({ key, dropped: provenance, kept: holder.record.provenance }, 'Duplicate record dropped');
      return { status: 'duplicate', key, keptBy: holder.record.provenance };
    }

    if (this.dedupIndex) {
      let fresh = true;
      try {
        fresh = await this.dedupIndex.claim(key);
      } catch (error) {
        // Index outage: fall back to run-scoped dedup
        this.log.warn({ key, error: getErrorMessage(error) }, 'Dedup index claim failed');
      }
      if (!fresh) {
        this.duplicateCount++;
        this.log.info({ key, dropped: provenance }, 'Record already present in dedup index');
        return { status: 'duplicate', key, keptBy: 'index' };
      }
    }

    this.entries.set(key, { ...candidate, key });
    return { status: 'accepted', key };
  }

  /**
   * Accepted records in canonical order.
   */
  records(): TrainingRecord[] {
    return [...this.entries.values()]
      .sort((a, b) => comparePositions(a.position, b.position))
      .map((entry) => entry.record);
  }

  get size(): number {
    return this.entries.size;
  }

  get duplicates(): number {
    return this.duplicateCount;
  }
}

// ===== Exchange format =====

const ExchangeRecordSchema = z.object({
  messages: z
    .array(z.object({ role: z.enum(['user', 'assistant']), content: z.string() }).strict())
    .min(1),
  provenance: z
    .object({
      source_id: z.string(),
      chunk_index: z.number().int().nonnegative(),
      lens_name: z.string(),
    })
    .strict(),
});

export type ExchangeRecord = z.infer<typeof ExchangeRecordSchema>;

export function toExchangeRecord(record: TrainingRecord): ExchangeRecord {
  return {
    messages: record.turns.map((turn) => ({ role: turn.role, content: turn.content })),
    provenance: {
      source_id: record.provenance.sourceId,
      chunk_index: record.provenance.chunkIndex,
      lens_name: record.provenance.lensName,
    },
  };
}

export function fromExchangeRecord(exchange: ExchangeRecord): TrainingRecord {
  return {
    turns: exchange.messages.map((message) => ({ role: message.role, content: message.content })),
    provenance: {
      sourceId: exchange.provenance.source_id,
      chunkIndex: exchange.provenance.chunk_index,
      lensName: exchange.provenance.lens_name,
    },
  };
}

/**
 * One JSON object per line, each line newline-terminated.
 */
export function serializeDataset(records: readonly TrainingRecord[]): string {
  return records.map((record) => `${JSON.stringify(toExchangeRecord(record))}\n`).join('');
}

export function parseDataset(text: string): TrainingRecord[] {
  const records: TrainingRecord[] = [];
  const lines = text.split('\n');

  lines.forEach((line, i) => {
    if (line.trim() === '') {
      return;
    }
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (error) {
      throw new DatasetFormatError(i + 1, `invalid JSON (${getErrorMessage(error)})`);
    }
    const parsed = ExchangeRecordSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new DatasetFormatError(i + 1, `${issue.path.join('.')}: ${issue.message}`);
    }
    records.push(fromExchangeRecord(parsed.data));
  });

  return records;
}

export async function writeDataset(path: string, records: readonly TrainingRecord[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, serializeDataset(records), 'utf8');
  rootLogger.info({ path, records: records.length }, 'Dataset written');
}

export async function readDataset(path: string): Promise<TrainingRecord[]> {
  return parseDataset(await readFile(path, 'utf8'));
}
