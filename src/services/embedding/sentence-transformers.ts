/**
 * SentenceTransformerModel - TypeScript bridge to python/embedding_worker.py
 *
 * Each encode() call runs the worker once: texts go in on stdin as JSON,
 * one JSON result line comes back on stdout. The worker loads the model
 * named in the arguments and returns L2-normalized vectors.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/embedding/sentence-transformers
 */

import { PythonShell, Options as PythonShellOptions } from 'python-shell';
import { z } from 'zod';
import { resolveWorkerScript } from '../../utils/worker-path.js';
import { EmbeddingError, EmbeddingErrorCode, EmbeddingModel } from './model.js';

export const DEFAULT_EMBEDDING_MODEL = 'BAAI/bge-small-en';
export const DEFAULT_EMBEDDING_DIMENSIONS = 384;
export const DEFAULT_MAX_INPUT_TOKENS = 512;

/** Matches the JSON line printed by embedding_worker.py */
const WorkerResultSchema = z.object({
  success: z.boolean(),
  embeddings: z.array(z.array(z.number())).default([]),
  model: z.string().optional(),
  device: z.string().optional(),
  elapsed_ms: z.number().optional(),
  error: z.string().nullable().default(null),
});

type WorkerResult = z.infer<typeof WorkerResultSchema>;

export interface SentenceTransformerOptions {
  modelName?: string;
  dimensions?: number;
  maxInputTokens?: number;
  /** 'cpu', 'cuda', 'mps'; worker auto-detects when omitted */
  device?: string;
  pythonPath?: string;
  workerPath?: string;
  /** Hard kill deadline for one worker run (default: 5 minutes) */
  workerTimeoutMs?: number;
}

/** Max stderr accumulation: 10KB */
const MAX_STDERR_LENGTH = 10_240;

/** SIGKILL grace period after SIGTERM */
const SIGKILL_GRACE_MS = 5_000;

export class SentenceTransformerModel implements EmbeddingModel {
  readonly identity: string;
  readonly dimensions: number;
  readonly maxInputTokens: number;
  private readonly device: string | undefined;
  private readonly pythonPath: string | undefined;
  private readonly workerPath: string;
  private readonly workerTimeoutMs: number;
  private lastDevice = 'unknown';

  constructor(options: SentenceTransformerOptions = {}) {
    this.identity = options.modelName ?? DEFAULT_EMBEDDING_MODEL;
    this.dimensions = options.dimensions ?? DEFAULT_EMBEDDING_DIMENSIONS;
    this.maxInputTokens = options.maxInputTokens ?? DEFAULT_MAX_INPUT_TOKENS;
    this.device = options.device;
    this.pythonPath = options.pythonPath;
    this.workerPath = options.workerPath ?? resolveWorkerScript('embedding_worker.py');
    this.workerTimeoutMs = options.workerTimeoutMs ?? 300_000;
  }

  /** Device reported by the last successful worker run */
  getLastDevice(): string {
    return this.lastDevice;
  }

  async encode(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const args = ['--model', this.identity, '--stdin', '--json'];
    if (this.device) {
      args.push('--device', this.device);
    }

    const result = await this.runWorker(args, JSON.stringify(texts));
    if (!result.success) {
      throw new EmbeddingError(
        result.error ?? 'Embedding worker failed with no error message',
        classifyError(result.error),
        { count: texts.length, model: this.identity, device: result.device }
      );
    }

    this.lastDevice = result.device ?? 'unknown';
    return result.embeddings;
  }

  private runWorker(args: string[], stdin: string): Promise<WorkerResult> {
    return new Promise((resolve, reject) => {
      let settled = false;
      const options: PythonShellOptions = {
        mode: 'text',
        pythonPath: this.pythonPath,
        pythonOptions: ['-u'],
        args,
      };

      const shell = new PythonShell(this.workerPath, options);
      let stderr = '';
      let sigkillTimer: ReturnType<typeof setTimeout> | null = null;

      const timer = setTimeout(() => {
        if (settled) return;
        try {
          shell.kill();
        } catch (error) {
          console.error(
            '[SentenceTransformer] Failed to kill worker on timeout:',
            error instanceof Error ? error.message : String(error)
          );
        }
        sigkillTimer = setTimeout(() => {
          if (settled) return;
          console.error(
            `[SentenceTransformer] Worker ignored SIGTERM, sending SIGKILL (pid: ${shell.childProcess?.pid})`
          );
          try {
            shell.childProcess?.kill('SIGKILL');
          } catch (error) {
            console.error(
              '[SentenceTransformer] SIGKILL failed (process may be gone):',
              error instanceof Error ? error.message : String(error)
            );
          }
          settled = true;
          reject(
            new EmbeddingError(`Embedding worker timeout after ${this.workerTimeoutMs}ms`, 'WORKER_ERROR', {
              stderr: stderr.substring(0, 1000),
            })
          );
        }, SIGKILL_GRACE_MS);
      }, this.workerTimeoutMs);

      const lines: string[] = [];
      shell.on('message', (line: string) => {
        lines.push(line);
      });
      shell.on('stderr', (line: string) => {
        if (stderr.length < MAX_STDERR_LENGTH) {
          stderr += line + '\n';
        }
      });

      shell.end((err?: Error) => {
        clearTimeout(timer);
        if (sigkillTimer) clearTimeout(sigkillTimer);
        if (settled) return;
        settled = true;

        if (err) {
          console.error('[SentenceTransformer] Worker error:', err.message);
          if (stderr) console.error('[SentenceTransformer] Stderr:', stderr.substring(0, 1000));
          reject(
            new EmbeddingError(`Worker error: ${err.message}`, 'WORKER_ERROR', {
              stderr: stderr.substring(0, 1000),
            })
          );
          return;
        }

        try {
          resolve(parseLastJsonLine(lines));
        } catch (error) {
          reject(error);
        }
      });

      shell.send(stdin);
    });
  }
}

/**
 * The worker's result is its last JSON line; libraries it loads may print
 * other text to stdout first.
 */
export function parseLastJsonLine(lines: string[]): WorkerResult {
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i].trim();
    if (!line.startsWith('{')) continue;

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (error) {
      console.error(
        '[SentenceTransformer] Skipping unparseable output line:',
        error instanceof Error ? error.message : String(error)
      );
      continue;
    }
    const parsed = WorkerResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new EmbeddingError('Worker output does not match the expected shape', 'PARSE_ERROR', {
        issues: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      });
    }
    return parsed.data;
  }

  throw new EmbeddingError('Worker produced no JSON output', 'PARSE_ERROR', {
    output: lines.join('\n').substring(0, 1000),
  });
}

function classifyError(error: string | null): EmbeddingErrorCode {
  if (!error) return 'MODEL_FAILURE';
  const lower = error.toLowerCase();
  if (
    lower.includes('model not found') ||
    lower.includes('not a valid model identifier') ||
    lower.includes('no such file')
  ) {
    return 'MODEL_NOT_FOUND';
  }
  return 'MODEL_FAILURE';
}
