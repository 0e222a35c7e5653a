/**
 * CSV Loader for Backtest Engine
 *
 * Reads OHLCV bars from CSV files with a header row.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Bar, Logger } from '@crossover-bot/shared';

export type CSVTimestampFormat = 'auto' | 'unix_s' | 'unix_ms' | 'iso';

/**
 * CSV parsing options
 */
export interface CSVLoadOptions {
  /** Column name or index for timestamp (default: 'timestamp') */
  timestampColumn?: string | number;
  /** Column name or index for open (default: 'open') */
  openColumn?: string | number;
  /** Column name or index for high (default: 'high') */
  highColumn?: string | number;
  /** Column name or index for low (default: 'low') */
  lowColumn?: string | number;
  /** Column name or index for close (default: 'close') */
  closeColumn?: string | number;
  /** Column name or index for volume; missing column means volume 0 (default: 'volume') */
  volumeColumn?: string | number;
  /** Delimiter (default: ',') */
  delimiter?: string;
  /**
   * Timestamp format (default: 'auto'). Auto reads digit-only values of
   * 12+ digits as Unix ms, shorter ones as Unix seconds, anything else as ISO-8601.
   */
  timestampFormat?: CSVTimestampFormat;
  /** Skip rows with invalid data (default: true) */
  skipInvalid?: boolean;
  /** Receives a warning when rows were skipped */
  logger?: Logger;
}

type ResolvedOptions = Required<Omit<CSVLoadOptions, 'logger'>> & Pick<CSVLoadOptions, 'logger'>;

const DEFAULT_OPTIONS: ResolvedOptions = {
  timestampColumn: 'timestamp',
  openColumn: 'open',
  highColumn: 'high',
  lowColumn: 'low',
  closeColumn: 'close',
  volumeColumn: 'volume',
  delimiter: ',',
  timestampFormat: 'auto',
  skipInvalid: true,
};

/**
 * Parse a CSV line handling quoted values
 */
function parseCSVLine(line: string, delimiter: string): string[] {
  const result: string[] = [];
  let current = '';
  let inQuotes = false;

  for (const char of line) {
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === delimiter && !inQuotes) {
      result.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }

  result.push(current.trim());
  return result;
}

/**
 * Column index from header name or numeric index; -1 when absent
 */
function findColumnIndex(column: string | number, headers: string[]): number {
  if (typeof column === 'number') {
    return column < headers.length ? column : -1;
  }
  return headers.findIndex((h) => h.toLowerCase() === column.toLowerCase());
}

function getColumnIndex(column: string | number, headers: string[]): number {
  const index = findColumnIndex(column, headers);
  if (index === -1) {
    throw new Error(`Column "${column}" not found in headers: ${headers.join(', ')}`);
  }
  return index;
}

/**
 * Parse a CSV timestamp cell to Unix ms (NaN when unparseable)
 */
export function parseCSVTimestamp(value: string, format: CSVTimestampFormat = 'auto'): number {
  const trimmed = value.trim();
  switch (format) {
    case 'unix_s':
      return Number(trimmed) * 1000;
    case 'unix_ms':
      return Number(trimmed);
    case 'iso':
      return Date.parse(trimmed);
    case 'auto':
      if (/^\d+$/.test(trimmed)) {
        return trimmed.length >= 12 ? Number(trimmed) : Number(trimmed) * 1000;
      }
      return Date.parse(trimmed);
  }
}

/**
 * Load bars from a CSV file, sorted ascending by timestamp
 */
export function loadBarsFromCSV(filePath: string, options?: CSVLoadOptions): Bar[] {
  const opts: ResolvedOptions = { ...DEFAULT_OPTIONS, ...options };

  const absolutePath = path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath);

  if (!fs.existsSync(absolutePath)) {
    throw new Error(`CSV file not found: ${absolutePath}`);
  }

  const content = fs.readFileSync(absolutePath, 'utf-8');
  const lines = content.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const [headerLine, ...rows] = lines;

  if (headerLine === undefined) {
    throw new Error(`CSV file is empty: ${absolutePath}`);
  }

  const headers = parseCSVLine(headerLine, opts.delimiter);
  const tsIdx = getColumnIndex(opts.timestampColumn, headers);
  const openIdx = getColumnIndex(opts.openColumn, headers);
  const highIdx = getColumnIndex(opts.highColumn, headers);
  const lowIdx = getColumnIndex(opts.lowColumn, headers);
  const closeIdx = getColumnIndex(opts.closeColumn, headers);
  const volumeIdx = findColumnIndex(opts.volumeColumn, headers);

  const bars: Bar[] = [];
  let skipped = 0;

  rows.forEach((line, i) => {
    const values = parseCSVLine(line, opts.delimiter);
    const cell = (index: number): string => values[index] ?? '';

    const timestamp = Math.floor(parseCSVTimestamp(cell(tsIdx), opts.timestampFormat));
    const open = parseFloat(cell(openIdx));
    const high = parseFloat(cell(highIdx));
    const low = parseFloat(cell(lowIdx));
    const close = parseFloat(cell(closeIdx));
    const volume = volumeIdx === -1 || cell(volumeIdx) === '' ? 0 : parseFloat(cell(volumeIdx));

    if ([timestamp, open, high, low, close, volume].some((v) => !Number.isFinite(v))) {
      if (!opts.skipInvalid) {
        throw new Error(`Invalid value on line ${i + 2} of ${absolutePath}`);
      }
      skipped++;
      return;
    }

    bars.push({ timestamp, open, high, low, close, volume });
  });

  if (skipped > 0) {
    opts.logger?.warn('Skipped invalid CSV rows', { file: absolutePath, skipped });
  }

  bars.sort((a, b) => a.timestamp - b.timestamp);

  return bars;
}
