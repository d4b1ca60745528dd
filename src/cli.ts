#!/usr/bin/env node
/**
 * photo-dates CLI entry point
 */

import { run } from './command.js';

// ─── Entry ────────────────────────────────────────────────────────────────────

run(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
);
