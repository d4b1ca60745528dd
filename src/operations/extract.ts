/**
 * extractToReport() — walk a photo directory and write the date report CSV.
 */

import { readdir, stat, writeFile } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';
import { getPhotoExtensions } from '../detect.js';
import { InputResourceError } from '../errors.js';
import { silentLogger } from '../logger.js';
import { stringifyReport } from '../report/csv.js';
import { collectMetadataRow } from './collect.js';
import type { ExtractOptions, ExtractResult, MetadataRow } from '../types.js';

export const DEFAULT_REPORT_NAME = 'image_metadata.csv';

const PHOTO_EXTENSIONS = new Set(getPhotoExtensions());

const byName = (a: { name: string }, b: { name: string }) =>
  a.name < b.name ? -1 : a.name > b.name ? 1 : 0;

/**
 * Photo files under `dir`, matched by extension (case-insensitive). Entries
 * are visited in name order, files of a directory before its
 * sub-directories.
 */
export async function collectFiles(dir: string, recursive: boolean): Promise<string[]> {
  const entries = (await readdir(dir, { withFileTypes: true })).sort(byName);
  const files: string[] = [];
  const subdirs: string[] = [];

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (recursive) subdirs.push(fullPath);
    } else if (entry.isFile() && PHOTO_EXTENSIONS.has(extname(entry.name).toLowerCase())) {
      files.push(fullPath);
    }
  }

  for (const sub of subdirs) {
    files.push(...(await collectFiles(sub, recursive)));
  }
  return files;
}

async function assertDirectory(dir: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(dir)).isDirectory();
  } catch {
    throw new InputResourceError(dir, 'Directory not found');
  }
  if (!isDirectory) {
    throw new InputResourceError(dir, 'Not a directory');
  }
}

/**
 * Build one MetadataRow per photo under `dir` and write them as CSV.
 *
 * @throws {InputResourceError} when `dir` is missing or not a directory
 */
export async function extractToReport(
  dir: string,
  options: ExtractOptions = {}
): Promise<ExtractResult> {
  const logger = options.logger ?? silentLogger;
  const absDir = resolve(dir);
  await assertDirectory(absDir);

  const files = await collectFiles(absDir, options.recursive ?? true);
  const rows: MetadataRow[] = [];
  const failed: ExtractResult['failed'] = [];

  for (const file of files) {
    try {
      rows.push(await collectMetadataRow(file, options));
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      logger.error(`  ✗ ${file}: ${error}`);
      failed.push({ file, error });
    }
  }

  const outputPath = resolve(options.output ?? DEFAULT_REPORT_NAME);
  await writeFile(outputPath, stringifyReport(rows), 'utf8');
  logger.info(`Report written to ${outputPath} (${rows.length} files)`);

  return { outputPath, rows, failed };
}
