/**
 * photo-dates command line: argument parsing and command dispatch.
 *
 *  • extract: walk a directory, reconcile dates, write the report CSV
 *  • update: write each row's Set Date back into the photo's EXIF
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { createConsoleLogger } from './logger.js';
import { DEFAULT_REPORT_NAME, extractToReport } from './operations/extract.js';
import { updateFromReport } from './operations/update.js';
import { PhotoDatesError } from './errors.js';
import type { Logger } from './types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// ─── Helpers ──────────────────────────────────────────────────────────────────

export function getVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return 'unknown';
}

// ─── Help text ────────────────────────────────────────────────────────────────

export const HELP = `
photo-dates <command> [options]

Reconcile photo capture dates and write them back into EXIF.

COMMANDS
  extract <dir>               Write a CSV report of every photo's dates
  update <file.csv>           Write each row's Set Date into the photo's EXIF

EXTRACT
  -o, --output <file.csv>     Report path (default: "${DEFAULT_REPORT_NAME}")
  --no-recursive              Only scan the top-level directory

UPDATE
  --dry-run                   Show what would change, write nothing
  --backup <suffix>           Back up originals first (e.g. --backup .orig)

GENERAL
  -q, --quiet                 Only print warnings and errors
  -h, --help                  Show this help
  -v, --version               Show version
`.trim();

// ─── Argument parser ──────────────────────────────────────────────────────────

export type CliArgs =
  | { command: 'help' }
  | { command: 'version' }
  | { command: 'extract'; dir: string; output?: string; recursive: boolean; quiet: boolean }
  | { command: 'update'; csv: string; dryRun: boolean; backup?: string; quiet: boolean };

export type ParseResult = { ok: true; args: CliArgs } | { ok: false; error: string };

export function parseArgs(raw: string[]): ParseResult {
  if (raw.length === 0 || raw.includes('-h') || raw.includes('--help')) {
    return { ok: true, args: { command: 'help' } };
  }
  if (raw.includes('-v') || raw.includes('--version')) {
    return { ok: true, args: { command: 'version' } };
  }

  const [command, ...rest] = raw;
  if (command !== 'extract' && command !== 'update') {
    return { ok: false, error: `Unknown command: ${command ?? ''}` };
  }

  const positional: string[] = [];
  let output: string | undefined;
  let backup: string | undefined;
  let recursive = true;
  let dryRun = false;
  let quiet = false;

  for (let i = 0; i < rest.length; i++) {
    const a = rest[i]!;
    const value = () => {
      const next = rest[i + 1];
      if (next === undefined || next.startsWith('-')) return undefined;
      i++;
      return next;
    };

    switch (a) {
      case '-q': case '--quiet':  quiet = true; break;

      case '-o': case '--output':
        if (command !== 'extract') return { ok: false, error: `Unknown option: ${a}` };
        output = value();
        if (output === undefined) return { ok: false, error: `${a} requires a value` };
        break;

      case '--no-recursive':
        if (command !== 'extract') return { ok: false, error: `Unknown option: ${a}` };
        recursive = false;
        break;

      case '--dry-run':
        if (command !== 'update') return { ok: false, error: `Unknown option: ${a}` };
        dryRun = true;
        break;

      case '--backup': {
        if (command !== 'update') return { ok: false, error: `Unknown option: ${a}` };
        // Suffixes usually start with '.', so take the next token as is
        const next = rest[i + 1];
        if (next === undefined) return { ok: false, error: `${a} requires a value` };
        backup = next;
        i++;
        break;
      }

      default:
        if (a.startsWith('-')) return { ok: false, error: `Unknown option: ${a}` };
        positional.push(a);
    }
  }

  const [target, ...extra] = positional;
  if (target === undefined) {
    return {
      ok: false,
      error: command === 'extract' ? 'No directory specified' : 'No CSV file specified',
    };
  }
  if (extra.length > 0) {
    return { ok: false, error: `Unexpected argument: ${extra[0]}` };
  }

  return command === 'extract'
    ? {
        ok: true,
        args: { command, dir: target, recursive, quiet, ...(output !== undefined && { output }) },
      }
    : {
        ok: true,
        args: { command, csv: target, dryRun, quiet, ...(backup !== undefined && { backup }) },
      };
}

// ─── Main ─────────────────────────────────────────────────────────────────────

/**
 * Run the CLI and resolve to the process exit code. Input-resource errors
 * are reported and turned into exit code 1; anything else propagates.
 */
export async function run(argv: string[], logger?: Logger): Promise<number> {
  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    console.error(`Error: ${parsed.error}`);
    console.error(`Run 'photo-dates --help' for usage.`);
    return 1;
  }

  const { args } = parsed;
  if (args.command === 'help') {
    console.log(HELP);
    return 0;
  }
  if (args.command === 'version') {
    console.log(getVersion());
    return 0;
  }

  const log = logger ?? createConsoleLogger({ quiet: args.quiet });

  try {
    if (args.command === 'extract') {
      const result = await extractToReport(args.dir, {
        recursive: args.recursive,
        logger: log,
        ...(args.output !== undefined && { output: args.output }),
      });
      if (result.failed.length > 0) {
        log.warn(`${result.failed.length} file(s) could not be processed`);
      }
      return 0;
    }

    const summary = await updateFromReport(args.csv, {
      dryRun: args.dryRun,
      logger: log,
      ...(args.backup !== undefined && { backupSuffix: args.backup }),
    });
    log.info(
      `\n  ${args.dryRun ? 'Would update' : 'Updated'}: ${summary.updated}  ` +
        `Already current: ${summary.alreadyCurrent}  ` +
        `Skipped: ${summary.skipped}  Failed: ${summary.failed}`
    );
    return 0;
  } catch (err) {
    if (err instanceof PhotoDatesError) {
      log.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
