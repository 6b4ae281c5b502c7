/**
 * Startup Validation
 *
 * Checks the local dependencies the embedding and re-ranking workers need.
 * Warnings only: the server still answers document and config tools
 * without them.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import { existsSync } from 'fs';
import { spawnSync } from 'child_process';
import { resolveWorkerScript } from '../utils/worker-path.js';
import type { AppConfig } from './config.js';

const WORKER_SCRIPTS = ['embedding_worker.py', 'reranker_worker.py'] as const;

export function collectStartupWarnings(config: AppConfig): string[] {
  const warnings: string[] = [];

  for (const script of WORKER_SCRIPTS) {
    const scriptPath = resolveWorkerScript(script);
    if (!existsSync(scriptPath)) {
      warnings.push(`Worker script not found: ${scriptPath}. Ingestion and queries will fail.`);
    }
  }

  const python = config.pythonPath ?? (process.platform === 'win32' ? 'python' : 'python3');
  const versionCheck = spawnSync(python, ['--version'], { encoding: 'utf-8', timeout: 5000 });
  if (versionCheck.error || versionCheck.status !== 0) {
    warnings.push(
      `Python interpreter "${python}" is not runnable. Set RAG_PYTHON_PATH to a python3 with sentence-transformers installed.`
    );
  }

  return warnings;
}

export function validateStartupDependencies(config: AppConfig): void {
  const warnings = collectStartupWarnings(config);
  if (warnings.length === 0) return;

  console.error('=== STARTUP WARNINGS ===');
  for (const w of warnings) {
    console.error(`  - ${w}`);
  }
  console.error('========================');
}
