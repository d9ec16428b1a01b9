import test from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as sleep } from 'timers/promises';

import type { GenerationRequest, SourceDocument } from '@groundwork/shared';
import { runPipeline, applyOverrides, resolveRunOptions, type RunOptions } from './pipeline';
import { createDefaultCatalog } from './lenses';
import { serializeDataset } from './dataset';
import { ConfigError, GenerationError, RunAbortedError, UnknownLensError } from '../utils/errors';
import { ConcurrencyLimiter } from '../utils/limiter';
import type { CallOptions, GenerationClient } from '../utils/llm';

type Respond = (request: GenerationRequest, attempt: number, options: CallOptions) => Promise<string> | string;

/**
 * In-process backend: answers from a script keyed by the request.
 */
class FakeClient implements GenerationClient {
  readonly name = 'fake';
  readonly calls: string[] = [];
  readonly requests: GenerationRequest[] = [];
  private readonly attempts = new Map<string, number>();
  private active = 0;
  peak = 0;

  constructor(private readonly respond: Respond) {}

  async generate(request: GenerationRequest, options: CallOptions): Promise<string> {
    const key = `${request.sourceId}#${request.chunkIndex}:${request.lensName}`;
    const attempt = (this.attempts.get(key) ?? 0) + 1;
    this.attempts.set(key, attempt);
    this.calls.push(key);
    this.requests.push(request);

    this.active++;
    this.peak = Math.max(this.peak, this.active);
    try {
      return await this.respond(request, attempt, options);
    } finally {
      this.active--;
    }
  }
}

const catalog = createDefaultCatalog();

function options(overrides: Partial<RunOptions> = {}): RunOptions {
  return {
    lenses: ['dialog'],
    chunking: { size: 2000, overlap: 200, boundary: 'paragraph' },
    params: {},
    workers: 4,
    timeoutMs: 1000,
    retry: { maxAttempts: 4, baseDelayMs: 0, maxDelayMs: 0 },
    minRecordLength: 10,
    cleanSource: true,
    ...overrides,
  };
}

const dialogue = (question: string, answer: string) => `[Student] ${question}\n[Teacher] ${answer}`;

const manual: SourceDocument = {
  id: 'pump-manual',
  text: [
    'Centrifugal pumps move fluid by converting rotational energy into flow.',
    'The impeller spins inside a casing and throws fluid outward.',
    'Seals keep the fluid from leaking along the shaft.',
  ].join('\n\n'),
  metadata: { title: 'Pump Manual' },
};

test('one chunk, dialog lens, two-turn answer gives one user/assistant record', async () => {
  const client = new FakeClient(() =>
    dialogue('How does a centrifugal pump move fluid?', 'The impeller converts rotation into flow.')
  );

  const { report, records } = await runPipeline([manual], options(), { client, catalog });

  assert.equal(records.length, 1);
  assert.deepEqual(
    records[0].turns.map((turn) => turn.role),
    ['user', 'assistant']
  );
  assert.deepEqual(records[0].provenance, { sourceId: 'pump-manual', chunkIndex: 0, lensName: 'dialog' });
  assert.equal(report.status, 'completed');
  assert.equal(report.documents, 1);
  assert.equal(report.chunks, 1);
  assert.equal(report.workItems, 1);
  assert.equal(report.accepted, 1);
  assert.equal(report.retries, 0);
  assert.deepEqual(report.failures, {});
  assert.deepEqual(report.failed, []);
});

test('the prompt carries the document title and the passage', async () => {
  const client = new FakeClient(() => dialogue('What are seals for?', 'They stop leaks along the shaft.'));

  await runPipeline([manual], options({ params: { temperature: 0.1 } }), { client, catalog });

  assert.equal(client.requests.length, 1);
  const [request] = client.requests;
  assert.ok(request.prompt.includes('Context:\n\nPump Manual\n\nPassage:\n\nCentrifugal pumps move fluid'));
  assert.ok(request.prompt.endsWith('Seals keep the fluid from leaking along the shaft.'));
  assert.deepEqual(request.params, { temperature: 0.1, maxOutputTokens: 1024 });
});

test('documents are cleaned before chunking unless cleaning is turned off', async () => {
  const book: SourceDocument = {
    id: 'pump-stories',
    text: 'Pumps  move\t\twater   uphill.\n\n*** END OF THE PROJECT GUTENBERG EBOOK PUMP STORIES ***\nLicence text.',
  };
  const passage = (request: GenerationRequest) => request.prompt.slice(request.prompt.lastIndexOf('\n') + 1);

  const cleaned = new FakeClient(() => dialogue('What do pumps do?', 'They move water uphill.'));
  await runPipeline([book], options(), { client: cleaned, catalog });
  assert.equal(passage(cleaned.requests[0]), 'Pumps move water uphill.');

  const raw = new FakeClient(() => dialogue('What do pumps do?', 'They move water uphill.'));
  await runPipeline([book], options({ cleanSource: false }), { client: raw, catalog });
  assert.equal(passage(raw.requests[0]), 'Licence text.');
  assert.ok(raw.requests[0].prompt.includes('Pumps  move\t\twater   uphill.'));
});

test('a lens with a reply opening sends it and parses the continuation', async () => {
  const client = new FakeClient(() => 'What keeps fluid from leaking?\n[Teacher] Seals along the shaft keep it in.');

  const { report, records } = await runPipeline([manual], options({ lenses: ['lecture'] }), { client, catalog });

  assert.equal(client.requests[0].prefill, '[Student] ');
  assert.equal(client.requests[0].examples?.length, 2);
  assert.equal(report.accepted, 1);
  assert.deepEqual(records[0].turns, [
    { role: 'user', content: 'What keeps fluid from leaking?' },
    { role: 'assistant', content: 'Seals along the shaft keep it in.' },
  ]);
});

test('output without markers fails the item and leaves the dataset unchanged', async () => {
  const client = new FakeClient(() => 'Pumps are useful machines.');

  const { report, records } = await runPipeline([manual], options(), { client, catalog });

  assert.deepEqual(records, []);
  assert.equal(report.status, 'completed');
  assert.deepEqual(report.failures, { NoMarkersFound: 1 });
  assert.equal(report.failed.length, 1);
  assert.deepEqual(
    { ...report.failed[0], message: undefined },
    {
      provenance: { sourceId: 'pump-manual', chunkIndex: 0, lensName: 'dialog' },
      stage: 'parse',
      kind: 'NoMarkersFound',
      message: undefined,
    }
  );
});

test('one chunk under three lenses gives one record per lens in lens order', async () => {
  const client = new FakeClient(async (request) => {
    // finish out of order
    await sleep(request.lensName === 'dialog' ? 10 : 0);
    switch (request.lensName) {
      case 'dialog':
        return dialogue('What does the impeller do?', 'It throws fluid outward.');
      case 'qa':
        return 'What keeps fluid in?\n---\nThe shaft seals.';
      default:
        return 'Pumps turn rotation into flow while seals prevent leaks.';
    }
  });

  const { report, records } = await runPipeline([manual], options({ lenses: ['dialog', 'qa', 'summary'] }), {
    client,
    catalog,
  });

  assert.equal(report.workItems, 3);
  assert.deepEqual(
    records.map((record) => record.provenance.lensName),
    ['dialog', 'qa', 'summary']
  );
  assert.deepEqual(records[1].turns, [
    { role: 'user', content: 'What keeps fluid in?' },
    { role: 'assistant', content: 'The shaft seals.' },
  ]);
  assert.deepEqual(records[2].turns, [
    { role: 'user', content: 'Can you summarize this material?' },
    { role: 'assistant', content: 'Pumps turn rotation into flow while seals prevent leaks.' },
  ]);
});

test('two timeouts then success: accepted after two retries', async () => {
  const client = new FakeClient((_request, attempt) => {
    if (attempt <= 2) throw new GenerationError('Timeout', `attempt ${attempt} timed out`);
    return dialogue('Why do seals matter?', 'Without them the pump leaks.');
  });

  const { report, records } = await runPipeline([manual], options(), { client, catalog });

  assert.equal(records.length, 1);
  assert.equal(report.retries, 2);
  assert.equal(report.accepted, 1);
  assert.deepEqual(report.failures, {});
  assert.equal(client.calls.length, 3);
});

test('an exhausted retry budget records the last failure kind', async () => {
  const client = new FakeClient(() => {
    throw new GenerationError('BackendUnavailable', 'service down');
  });

  const { report, records } = await runPipeline([manual], options(), { client, catalog });

  assert.deepEqual(records, []);
  assert.equal(report.status, 'completed');
  assert.equal(report.retries, 3);
  assert.deepEqual(report.failures, { BackendUnavailable: 1 });
  assert.deepEqual(report.failed, [
    {
      provenance: { sourceId: 'pump-manual', chunkIndex: 0, lensName: 'dialog' },
      stage: 'generation',
      kind: 'BackendUnavailable',
      message: 'service down',
    },
  ]);
});

test('failures are counted per kind and listed in canonical order', async () => {
  const docs: SourceDocument[] = [
    { id: 'a', text: 'Alpha text.' },
    { id: 'b', text: 'Beta text.' },
    { id: 'c', text: 'Gamma text.' },
  ];
  const client = new FakeClient(async (request) => {
    if (request.sourceId === 'a') {
      await sleep(10);
      return 'no markers here';
    }
    if (request.sourceId === 'b') return dialogue('Hi?', 'Yo.');
    return dialogue('What does gamma text describe in this document?', 'It describes the gamma section.');
  });

  const { report, records } = await runPipeline(docs, options({ minRecordLength: 20 }), { client, catalog });

  assert.equal(records.length, 1);
  assert.deepEqual(report.failures, { NoMarkersFound: 1, TooShort: 1 });
  assert.deepEqual(
    report.failed.map((item) => [item.provenance.sourceId, item.stage, item.kind]),
    [
      ['a', 'parse', 'NoMarkersFound'],
      ['b', 'validation', 'TooShort'],
    ]
  );
  assert.equal(report.accepted + report.duplicates + report.failed.length, report.workItems);
});

test('the same dialogue from two lenses is kept once, under the earlier lens', async () => {
  const client = new FakeClient(async (request) => {
    await sleep(request.lensName === 'dialog' ? 10 : 0);
    return dialogue('What spins inside the casing?', 'The impeller spins inside the casing.');
  });

  const { report, records } = await runPipeline([manual], options({ lenses: ['dialog', 'lecture'] }), {
    client,
    catalog,
  });

  assert.equal(records.length, 1);
  assert.equal(records[0].provenance.lensName, 'dialog');
  assert.equal(report.accepted, 1);
  assert.equal(report.duplicates, 1);
});

test('fixed options and responses give byte-identical output at any worker count', async () => {
  const docs: SourceDocument[] = [
    { id: 'a', text: 'a'.repeat(120) },
    { id: 'b', text: 'b'.repeat(120) },
  ];
  const respond: Respond = async (request) => {
    await sleep((request.chunkIndex * 7 + request.lensName.length * 3) % 5);
    const [asker, answerer] = request.lensName === 'interview' ? ['Interviewer', 'Expert'] : ['Student', 'Teacher'];
    if (request.chunkIndex === 1) {
      return `[${asker}] What is in the middle part?\n[${answerer}] The middle part repeats a single letter.`;
    }
    return (
      `[${asker}] What does part ${request.chunkIndex} of ${request.sourceId} cover?\n` +
      `[${answerer}] It covers section ${request.chunkIndex} of ${request.sourceId} for ${request.lensName}.`
    );
  };
  const run = (workers: number) =>
    runPipeline(
      docs,
      options({ workers, lenses: ['dialog', 'interview'], chunking: { size: 40, overlap: 0, boundary: 'none' } }),
      { client: new FakeClient(respond), catalog }
    );

  const serial = await run(1);
  const parallel = await run(8);

  assert.equal(serial.report.workItems, 12);
  assert.equal(serial.records.length, 9);
  assert.equal(serial.report.duplicates, 3);
  assert.equal(
    serial.records.find((record) => record.turns[0].content === 'What is in the middle part?')?.provenance.sourceId,
    'a'
  );
  assert.equal(serializeDataset(parallel.records), serializeDataset(serial.records));
  assert.equal(parallel.report.duplicates, serial.report.duplicates);
});

test('a shared limiter caps calls below the worker count', async () => {
  const docs: SourceDocument[] = ['a', 'b', 'c', 'd', 'e'].map((id) => ({ id, text: `Document ${id} text.` }));
  const client = new FakeClient(async (request) => {
    await sleep(2);
    return dialogue(`What is document ${request.sourceId} about?`, `It is about ${request.sourceId}.`);
  });

  const { records } = await runPipeline(docs, options({ workers: 4 }), {
    client,
    catalog,
    limiter: new ConcurrencyLimiter(1),
  });

  assert.equal(records.length, 5);
  assert.equal(client.peak, 1);
});

test('an authentication failure aborts the run with the partial result', async () => {
  const docs: SourceDocument[] = [
    { id: 'a', text: 'Alpha text.' },
    { id: 'b', text: 'Beta text.' },
    { id: 'c', text: 'Gamma text.' },
  ];
  const client = new FakeClient((request) => {
    if (request.sourceId === 'b') throw new GenerationError('AuthError', 'invalid api key');
    return dialogue('What does this text describe?', `It describes ${request.sourceId}.`);
  });

  await assert.rejects(runPipeline(docs, options({ workers: 1 }), { client, catalog }), (error: unknown) => {
    assert.ok(error instanceof RunAbortedError);
    assert.ok(error.cause instanceof GenerationError);
    assert.equal(error.cause.kind, 'AuthError');
    assert.equal(error.result.report.status, 'aborted');
    assert.equal(error.result.report.admitted, 2);
    assert.equal(error.result.report.cancelled, 1);
    assert.deepEqual(
      error.result.records.map((record) => record.provenance.sourceId),
      ['a']
    );
    return true;
  });
  assert.deepEqual(client.calls, ['a#0:dialog', 'b#0:dialog']);
});

test('an unexpected error aborts the run', async () => {
  const client = new FakeClient(() => {
    throw new TypeError('response.choices is undefined');
  });

  await assert.rejects(runPipeline([manual], options(), { client, catalog }), (error: unknown) => {
    assert.ok(error instanceof RunAbortedError);
    assert.ok(error.cause instanceof TypeError);
    assert.equal(error.result.report.status, 'aborted');
    return true;
  });
  assert.equal(client.calls.length, 1);
});

test('cancelling keeps accepted records and counts the rest as cancelled', async () => {
  const docs: SourceDocument[] = [
    { id: 'a', text: 'Alpha text.' },
    { id: 'b', text: 'Beta text.' },
    { id: 'c', text: 'Gamma text.' },
  ];
  const external = new AbortController();
  const client = new FakeClient((request, _attempt, { signal }) => {
    if (request.sourceId !== 'b') {
      return dialogue('What does this text describe?', `It describes ${request.sourceId}.`);
    }
    if (!signal) throw new Error('expected a cancellation signal');
    return new Promise<string>((_resolve, reject) => {
      signal.addEventListener('abort', () => reject(signal.reason), { once: true });
      setImmediate(() => external.abort(new Error('user cancelled')));
    });
  });

  const { report, records } = await runPipeline(
    docs,
    options({ workers: 1 }),
    { client, catalog },
    { signal: external.signal }
  );

  assert.equal(report.status, 'cancelled');
  assert.equal(report.admitted, 2);
  assert.equal(report.cancelled, 2);
  assert.deepEqual(
    records.map((record) => record.provenance.sourceId),
    ['a']
  );
  assert.deepEqual(client.calls, ['a#0:dialog', 'b#0:dialog']);
});

test('a signal aborted before the run admits nothing', async () => {
  const external = new AbortController();
  external.abort();
  const client = new FakeClient(() => dialogue('Q?', 'A.'));

  const { report, records } = await runPipeline([manual], options(), { client, catalog }, { signal: external.signal, runId: 'run_fixed' });

  assert.equal(report.runId, 'run_fixed');
  assert.equal(report.status, 'cancelled');
  assert.equal(report.admitted, 0);
  assert.equal(report.cancelled, 1);
  assert.deepEqual(records, []);
  assert.deepEqual(client.calls, []);
});

test('whitespace-only chunks are skipped', async () => {
  const client = new FakeClient(() => dialogue('Q?', 'A.'));

  const { report } = await runPipeline([{ id: 'blank', text: '  \n\n  ' }], options(), { client, catalog });

  assert.equal(report.status, 'completed');
  assert.equal(report.chunks, 1);
  assert.equal(report.skippedChunks, 1);
  assert.equal(report.workItems, 0);
  assert.deepEqual(client.calls, []);
});

test('configuration errors surface before any backend call', async () => {
  const client = new FakeClient(() => dialogue('Q?', 'A.'));
  const deps = { client, catalog };

  await assert.rejects(runPipeline([manual], options({ lenses: ['dialog', 'poem'] }), deps), UnknownLensError);
  await assert.rejects(runPipeline([manual, manual], options(), deps), /Duplicate document id: "pump-manual"/);
  await assert.rejects(
    runPipeline([manual], options({ chunking: { size: 100, overlap: 100, boundary: 'none' } }), deps),
    ConfigError
  );
  await assert.rejects(runPipeline([manual], options({ lenses: ['dialog', 'dialog'] }), deps), /listed twice/);
  assert.deepEqual(client.calls, []);
});

test('overrides merge into the base options and are validated', () => {
  const base = options();
  const merged = applyOverrides(base, { chunking: { size: 500 }, params: { topP: 0.9 }, retry: { maxAttempts: 2 } });

  assert.deepEqual(merged.chunking, { size: 500, overlap: 200, boundary: 'paragraph' });
  assert.deepEqual(merged.params, { topP: 0.9 });
  assert.deepEqual(merged.retry, { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 });
  assert.equal(merged.workers, 4);
  assert.equal(merged.cleanSource, true);
  assert.equal(applyOverrides(base, { cleanSource: false }).cleanSource, false);
  assert.equal(resolveRunOptions({ ...base, cleanSource: undefined }).cleanSource, true);
  assert.throws(() => applyOverrides(base, { workers: 0 }), /Invalid run options: workers/);
  assert.throws(() => resolveRunOptions({ ...base, lenses: [] }), ConfigError);
});
