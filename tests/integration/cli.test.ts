import { describe, it, expect, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { HELP, run } from '../../src/command.js';
import { parseCsvWithHeader } from '../../src/report/csv.js';
import { buildPng } from '../helpers/images.js';
import { createRecordingLogger } from '../helpers/logger.js';

const TMP_DIR = join(dirname(fileURLToPath(import.meta.url)), '../tmp-cli');

function setupTmp(): void {
  mkdirSync(TMP_DIR, { recursive: true });
  writeFileSync(join(TMP_DIR, '2016-01-02_scan.png'), buildPng());
}

function cleanupTmp(): void {
  if (existsSync(TMP_DIR)) {
    rmSync(TMP_DIR, { recursive: true, force: true });
  }
}

describe('CLI', () => {
  afterEach(() => {
    cleanupTmp();
    vi.restoreAllMocks();
  });

  it('should show help when no args provided', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    expect(await run([])).toBe(0);
    expect(log).toHaveBeenCalledWith(HELP);
  });

  it('should show the package version', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    expect(await run(['--version'])).toBe(0);
    expect(log).toHaveBeenCalledWith('0.1.0');
  });

  it('should exit 1 on bad arguments', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(await run(['frobnicate'])).toBe(1);
    expect(error.mock.calls).toEqual([
      ['Error: Unknown command: frobnicate'],
      ["Run 'photo-dates --help' for usage."],
    ]);
  });

  it('should extract a report', async () => {
    setupTmp();
    const output = join(TMP_DIR, 'out.csv');
    const logger = createRecordingLogger();

    expect(await run(['extract', TMP_DIR, '-o', output], logger)).toBe(0);

    const { rows } = parseCsvWithHeader(readFileSync(output, 'utf8'));
    expect(rows.map(r => [r['Filename'], r['From Filename']])).toEqual([
      ['2016-01-02_scan.png', '2016-01-02 00:00:00'],
    ]);
  });

  it('should exit 1 when the directory does not exist', async () => {
    const logger = createRecordingLogger();
    const missing = join(TMP_DIR, 'missing');
    expect(await run(['extract', missing], logger)).toBe(1);
    expect(logger.errors).toEqual([`Error: Directory not found: ${missing}`]);
  });

  it('should print the update summary', async () => {
    setupTmp();
    const csv = join(TMP_DIR, 'report.csv');
    writeFileSync(csv, `Folder,Filename,Set Date\r\n${TMP_DIR},2016-01-02_scan.png,2016-01-02 10:00\r\n`);
    const logger = createRecordingLogger();

    expect(await run(['update', csv, '--dry-run'], logger)).toBe(0);
    expect(logger.infos[logger.infos.length - 1]).toBe(
      '\n  Would update: 1  Already current: 0  Skipped: 0  Failed: 0'
    );
    expect(Array.from(readFileSync(join(TMP_DIR, '2016-01-02_scan.png')))).toEqual(
      Array.from(buildPng())
    );
  });

  it('should exit 1 when the report cannot be read', async () => {
    const logger = createRecordingLogger();
    expect(await run(['update', join(TMP_DIR, 'none.csv')], logger)).toBe(1);
    expect(logger.errors[0]).toMatch(/^Error: Cannot read report/);
  });
});
