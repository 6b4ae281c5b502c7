/**
 * Cross-encoder model contract and the local worker bridge
 *
 * LocalCrossEncoder spawns python/reranker_worker.py, which scores each
 * (query, passage) pair independently and reports per-passage failures
 * instead of failing the whole call.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/search/cross-encoder
 */

import { spawn } from 'child_process';
import * as fs from 'fs';
import { z } from 'zod';
import { resolveWorkerScript } from '../../utils/worker-path.js';

export const DEFAULT_RERANKER_MODEL = 'BAAI/bge-reranker-base';

export interface PassageInput {
  index: number;
  text: string;
}

export type PassageScore = { index: number; score: number } | { index: number; error: string };

/**
 * Scores (query, passage) pairs. A score depends only on the pair.
 */
export interface CrossEncoderModel {
  readonly identity: string;
  score(query: string, passages: PassageInput[]): Promise<PassageScore[]>;
}

type CrossEncoderErrorCode = 'WORKER_UNAVAILABLE' | 'WORKER_FAILED' | 'PARSE_ERROR';

export class CrossEncoderError extends Error {
  constructor(
    message: string,
    public readonly code: CrossEncoderErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CrossEncoderError';
    Error.captureStackTrace?.(this, CrossEncoderError);
  }
}

const WorkerOutputSchema = z.union([
  z.object({
    results: z.array(
      z.union([
        z.object({ index: z.number().int(), score: z.number() }),
        z.object({ index: z.number().int(), error: z.string() }),
      ])
    ),
  }),
  z.object({ error: z.string() }),
]);

/** Max stderr accumulation: 10KB */
const MAX_STDERR_LENGTH = 10_240;

/** SIGKILL grace period after SIGTERM */
const SIGKILL_GRACE_MS = 5_000;

export interface LocalCrossEncoderOptions {
  modelName?: string;
  pythonPath?: string;
  workerPath?: string;
  /** Process kill deadline (default: 60s) */
  workerTimeoutMs?: number;
}

export class LocalCrossEncoder implements CrossEncoderModel {
  readonly identity: string;
  private readonly pythonPath: string;
  private readonly workerPath: string;
  private readonly workerTimeoutMs: number;

  constructor(options: LocalCrossEncoderOptions = {}) {
    this.identity = options.modelName ?? DEFAULT_RERANKER_MODEL;
    this.pythonPath = options.pythonPath ?? (process.platform === 'win32' ? 'python' : 'python3');
    this.workerPath = options.workerPath ?? resolveWorkerScript('reranker_worker.py');
    this.workerTimeoutMs = options.workerTimeoutMs ?? 60_000;
  }

  async score(query: string, passages: PassageInput[]): Promise<PassageScore[]> {
    if (passages.length === 0) return [];
    if (!fs.existsSync(this.workerPath)) {
      throw new CrossEncoderError(`Reranker worker not found: ${this.workerPath}`, 'WORKER_UNAVAILABLE');
    }

    const stdout = await this.runWorker(JSON.stringify({ model: this.identity, query, passages }));

    let raw: unknown;
    try {
      raw = JSON.parse(stdout.trim().split('\n').pop() ?? '');
    } catch (error) {
      throw new CrossEncoderError('Reranker worker output is not JSON', 'PARSE_ERROR', {
        preview: stdout.slice(0, 200),
        error: error instanceof Error ? error.message : String(error),
      });
    }

    const parsed = WorkerOutputSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CrossEncoderError('Reranker worker output has an unexpected shape', 'PARSE_ERROR', {
        preview: stdout.slice(0, 200),
      });
    }
    if ('error' in parsed.data) {
      throw new CrossEncoderError(`Reranker worker error: ${parsed.data.error}`, 'WORKER_FAILED');
    }
    return parsed.data.results;
  }

  private runWorker(input: string): Promise<string> {
    return new Promise((resolve, reject) => {
      const proc = spawn(this.pythonPath, [this.workerPath], {
        timeout: this.workerTimeoutMs,
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let settled = false;
      let sigkillTimer: ReturnType<typeof setTimeout> | null = null;

      const settle = (fn: () => void): void => {
        if (sigkillTimer) {
          clearTimeout(sigkillTimer);
          sigkillTimer = null;
        }
        if (settled) return;
        settled = true;
        fn();
      };

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      proc.stderr.on('data', (data: Buffer) => {
        if (stderr.length < MAX_STDERR_LENGTH) {
          stderr += data.toString();
        }
      });

      proc.on('error', (err: Error) => {
        settle(() =>
          reject(new CrossEncoderError(`Reranker process error: ${err.message}`, 'WORKER_UNAVAILABLE'))
        );
      });

      proc.on('close', (code: number | null, signal: string | null) => {
        if (stderr.trim()) {
          console.error('[cross-encoder] stderr:', stderr.trim().slice(0, 500));
        }
        settle(() => {
          if (code !== 0) {
            reject(
              new CrossEncoderError(
                `Reranker process exited with code ${String(code)}, signal ${String(signal)}`,
                'WORKER_FAILED',
                { stderr: stderr.slice(0, 1000) }
              )
            );
            return;
          }
          resolve(stdout);
        });
      });

      // spawn's timeout sends SIGTERM; escalate if the process ignores it
      sigkillTimer = setTimeout(() => {
        if (!settled && !proc.killed) {
          console.error('[cross-encoder] SIGKILL escalation after timeout grace period');
          proc.kill('SIGKILL');
        }
      }, this.workerTimeoutMs + SIGKILL_GRACE_MS);

      // A worker that exits before reading its input breaks the pipe (EPIPE)
      proc.stdin.on('error', (err: Error) => {
        settle(() =>
          reject(new CrossEncoderError(`Reranker worker input failed: ${err.message}`, 'WORKER_FAILED'))
        );
      });

      proc.stdin.write(input);
      proc.stdin.end();
    });
  }
}
