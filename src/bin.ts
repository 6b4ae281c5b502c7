#!/usr/bin/env node
/**
 * CLI entry point for global installation.
 *
 * Usage:
 *   cited-retrieval           # after npm install -g
 *   node dist/src/bin.js      # direct invocation
 *
 * @module bin
 */

import './index.js';
