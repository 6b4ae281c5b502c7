/**
 * Locate bundled Python worker scripts.
 *
 * Scripts live in python/ at the package root. Compiled code runs one
 * directory deeper (dist/src/...) than the sources, so both layouts are
 * tried.
 *
 * @module utils/worker-path
 */

import { existsSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export function resolveWorkerScript(scriptName: string): string {
  const candidates = [
    path.resolve(__dirname, '../../python', scriptName),
    path.resolve(__dirname, '../../../python', scriptName),
  ];
  return candidates.find((candidate) => existsSync(candidate)) ?? candidates[0];
}
