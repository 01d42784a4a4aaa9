import { ValidationFailureError } from '@trialgrid/core';

import type { FileSystem } from './types.js';

export interface MetricsValidationOptions {
  expectedDurationSec: number;
  toleranceSec: number;
  timestampColumn: string;
}

export interface MetricsSummary {
  rows: number;
  durationSec: number;
}

const NUMERIC = /^\d+(\.\d+)?$/;

/** Parse an ISO-8601 timestamp or numeric epoch seconds into epoch seconds; NaN if neither. */
export function parseTimestamp(value: string): number {
  const trimmed = value.trim();
  if (NUMERIC.test(trimmed)) return Number(trimmed);
  return Date.parse(trimmed) / 1000;
}

/**
 * Check a produced metrics table.
 *
 * It must exist, hold at least one data row, carry the timestamp column, and its first-to-last
 * timestamp span must be within `toleranceSec` of `expectedDurationSec`.
 *
 * @throws ValidationFailureError naming the first violated condition
 */
export async function validateMetricsTable(
  fs: FileSystem,
  file: string,
  opts: MetricsValidationOptions,
): Promise<MetricsSummary> {
  if (!(await fs.exists(file))) {
    throw new ValidationFailureError(`Metrics table not found: ${file}`);
  }

  const lines = (await fs.readText(file)).split(/\r?\n/).filter((line) => line.trim().length > 0);
  if (lines.length <= 1) {
    throw new ValidationFailureError(`Metrics table ${file} has no data rows (header only)`);
  }

  const header = (lines[0] ?? '').split(',').map((cell) => cell.trim());
  const column = header.indexOf(opts.timestampColumn);
  if (column === -1) {
    throw new ValidationFailureError(`Column "${opts.timestampColumn}" not found in ${file}`);
  }

  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  const rows = lines.slice(1);
  for (const [index, row] of rows.entries()) {
    const raw = row.split(',')[column] ?? '';
    const seconds = parseTimestamp(raw);
    if (Number.isNaN(seconds)) {
      throw new ValidationFailureError(`Unparseable timestamp "${raw}" on data row ${index + 1} of ${file}`);
    }
    min = Math.min(min, seconds);
    max = Math.max(max, seconds);
  }

  const durationSec = max - min;
  if (Math.abs(durationSec - opts.expectedDurationSec) > opts.toleranceSec) {
    throw new ValidationFailureError(
      `Run duration ${durationSec}s is outside ${opts.expectedDurationSec}±${opts.toleranceSec}s`,
    );
  }

  return { rows: rows.length, durationSec };
}
