#!/usr/bin/env node
// ═══════════════════════════════════════════════════════════════════════════════
// CDN-SIEVE — Command Line Entry Point
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../observability/logging/index.js';
import { ExitCode, run } from './run.js';

run(process.argv.slice(2), {
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
}).then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    getLogger({ component: 'cli' }).fatal('Unexpected failure', error);
    process.exitCode = ExitCode.FATAL;
  }
);
