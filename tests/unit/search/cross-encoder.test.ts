/**
 * Unit tests for LocalCrossEncoder process handling
 *
 * child_process is replaced by an in-process fake worker.
 *
 * @module tests/unit/search/cross-encoder
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { EventEmitter } from 'events';
import { PassThrough, Writable } from 'stream';
import { fileURLToPath } from 'url';
import { LocalCrossEncoder } from '../../../src/services/search/cross-encoder.js';

const worker = vi.hoisted(() => ({
  create: (): unknown => {
    throw new Error('No fake worker installed');
  },
}));

vi.mock('child_process', () => ({
  spawn: () => worker.create(),
}));

/** Any existing file passes the worker-script check */
const WORKER_PATH = fileURLToPath(import.meta.url);

class FakeWorker extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  killed = false;
  received = '';

  constructor(readonly stdin: Writable) {
    super();
  }

  kill(): boolean {
    this.killed = true;
    return true;
  }

  finish(code: number, output: string): void {
    this.stdout.end(output);
    setTimeout(() => this.emit('close', code, null), 5);
  }
}

/** Accepts input and answers with the given stdout */
function answeringWorker(output: string): FakeWorker {
  const fake: FakeWorker = new FakeWorker(
    new Writable({
      write(chunk: Buffer, _encoding, callback) {
        fake.received += chunk.toString();
        callback();
      },
      final(callback) {
        callback();
        fake.finish(0, output);
      },
    })
  );
  return fake;
}

/** Exits without reading: every write fails with EPIPE */
function exitedWorker(): FakeWorker {
  const fake: FakeWorker = new FakeWorker(
    new Writable({
      write(_chunk, _encoding, callback) {
        callback(Object.assign(new Error('write EPIPE'), { code: 'EPIPE' }));
        setTimeout(() => fake.emit('close', 1, null), 5);
      },
    })
  );
  return fake;
}

afterEach(() => {
  worker.create = () => {
    throw new Error('No fake worker installed');
  };
});

describe('LocalCrossEncoder', () => {
  it('sends the pairs on stdin and parses the scores', async () => {
    const fake = answeringWorker('{"results":[{"index":0,"score":0.8},{"index":1,"error":"too long"}]}\n');
    worker.create = () => fake;
    const encoder = new LocalCrossEncoder({ modelName: 'test-reranker', workerPath: WORKER_PATH });

    const scores = await encoder.score('pumps', [
      { index: 0, text: 'The pump moves coolant.' },
      { index: 1, text: 'Valves.' },
    ]);

    expect(scores).toEqual([
      { index: 0, score: 0.8 },
      { index: 1, error: 'too long' },
    ]);
    expect(JSON.parse(fake.received)).toEqual({
      model: 'test-reranker',
      query: 'pumps',
      passages: [
        { index: 0, text: 'The pump moves coolant.' },
        { index: 1, text: 'Valves.' },
      ],
    });
  });

  it('rejects when the worker exits before reading its input', async () => {
    worker.create = () => exitedWorker();
    const encoder = new LocalCrossEncoder({ workerPath: WORKER_PATH });

    await expect(encoder.score('pumps', [{ index: 0, text: 'The pump moves coolant.' }])).rejects.toMatchObject({
      name: 'CrossEncoderError',
      code: 'WORKER_FAILED',
      message: 'Reranker worker input failed: write EPIPE',
    });
  });

  it('skips the worker for an empty passage list', async () => {
    const encoder = new LocalCrossEncoder({ workerPath: WORKER_PATH });

    await expect(encoder.score('pumps', [])).resolves.toEqual([]);
  });
});
