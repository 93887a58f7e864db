/**
 * Inflammation CSV Loader
 *
 * Reads rows of comma-separated floating-point numbers into a nested array:
 * one patient per line, one day per column. Lines starting with `#` are
 * comments. `nan` (any case) marks a missing measurement and `inf` or
 * `infinity` (any case, optional sign) an unbounded one.
 */

import { readFile } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';

import { getEnv } from './env.js';
import { DataSourceError, ValidationError } from './errors.js';
import { createLogger } from './logger.js';

const logger = createLogger({ name: 'csv-loader' });

const NAN_PATTERN = /^[+-]?nan$/i;
const INF_PATTERN = /^([+-]?)inf(inity)?$/i;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export interface LoadCSVOptions {
  /** Directory relative file names are resolved against (default: INFLAMMATION_DATA_DIR) */
  dataDir?: string;
  /** Cell delimiter (default: ',') */
  delimiter?: string;
}

function parseCell(cell: string, line: number, column: number): number {
  const trimmed = cell.trim();
  if (NAN_PATTERN.test(trimmed)) {
    return Number.NaN;
  }
  const inf = INF_PATTERN.exec(trimmed);
  if (inf) {
    return inf[1] === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }

  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new ValidationError(`Invalid number at line ${line}, column ${column}`, {
      line,
      column,
      value: trimmed,
    });
  }
  return Number(trimmed);
}

/**
 * Parse CSV content into a rectangular table of numbers
 */
export function parseInflammationCSV(content: string, delimiter = ','): number[][] {
  const rows: number[][] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) {
      return;
    }

    const lineNumber = index + 1;
    const row = line.split(delimiter).map((cell, col) => parseCell(cell, lineNumber, col + 1));

    const expected = rows[0]?.length;
    if (expected !== undefined && row.length !== expected) {
      throw new ValidationError(
        `Line ${lineNumber} has ${row.length} columns, expected ${expected}`,
        { line: lineNumber, columns: row.length, expected }
      );
    }
    rows.push(row);
  });

  return rows;
}

/**
 * Resolve a data file name against the configured data directory
 */
export function resolveDataPath(filename: string, dataDir?: string): string {
  const base = dataDir ?? getEnv().INFLAMMATION_DATA_DIR;
  if (base === undefined || isAbsolute(filename)) {
    return filename;
  }
  return join(base, filename);
}

/**
 * Load an inflammation table from a CSV file
 */
export async function loadInflammationCSV(
  filename: string,
  options: LoadCSVOptions = {}
): Promise<number[][]> {
  const path = resolveDataPath(filename, options.dataDir);

  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    throw new DataSourceError(
      path,
      'failed to read inflammation data',
      error instanceof Error ? error : undefined
    );
  }

  const rows = parseInflammationCSV(content, options.delimiter);
  logger.debug(
    { path, patients: rows.length, days: rows[0]?.length ?? 0 },
    'Loaded inflammation table'
  );
  return rows;
}
