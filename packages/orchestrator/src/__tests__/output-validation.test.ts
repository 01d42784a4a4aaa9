import { describe, expect, it } from 'vitest';

import { ValidationFailureError } from '@trialgrid/core';

import { parseTimestamp, validateMetricsTable } from '../output-validation.js';
import { FakeFileSystem } from './helpers.js';

const FILE = '/trials/trialset0/exp1/metrics/kpm.csv';
const opts = { expectedDurationSec: 480, toleranceSec: 10, timestampColumn: 'Timestamp' };

function withTable(content: string): FakeFileSystem {
  const fs = new FakeFileSystem();
  fs.put(FILE, content);
  return fs;
}

describe('parseTimestamp', () => {
  it('reads epoch seconds', () => {
    expect(parseTimestamp(' 1700000000.5 ')).toBe(1700000000.5);
  });

  it('reads ISO-8601', () => {
    expect(parseTimestamp('1970-01-01T00:01:00Z')).toBe(60);
  });

  it('yields NaN for anything else', () => {
    expect(parseTimestamp('soon')).toBeNaN();
  });
});

describe('validateMetricsTable', () => {
  it('accepts a table spanning the expected duration', async () => {
    const fs = withTable('Timestamp,ue,dl_mbps\n1000,ue1,5\n1240,ue2,4\n1475,ue1,6\n');
    await expect(validateMetricsTable(fs, FILE, opts)).resolves.toEqual({ rows: 3, durationSec: 475 });
  });

  it('accepts ISO timestamps', async () => {
    const fs = withTable('ue,Timestamp\nue1,2026-01-01T00:00:00Z\nue1,2026-01-01T00:08:00Z\n');
    await expect(validateMetricsTable(fs, FILE, opts)).resolves.toEqual({ rows: 2, durationSec: 480 });
  });

  it('fails for a missing table', async () => {
    await expect(validateMetricsTable(new FakeFileSystem(), FILE, opts)).rejects.toThrow(
      `Metrics table not found: ${FILE}`,
    );
  });

  it('fails for a header-only table', async () => {
    await expect(validateMetricsTable(withTable('Timestamp,ue\n\n'), FILE, opts)).rejects.toThrow(
      `Metrics table ${FILE} has no data rows (header only)`,
    );
  });

  it('fails without the timestamp column', async () => {
    await expect(validateMetricsTable(withTable('time,ue\n1,ue1\n'), FILE, opts)).rejects.toThrow(
      `Column "Timestamp" not found in ${FILE}`,
    );
  });

  it('fails on an unparseable timestamp', async () => {
    await expect(validateMetricsTable(withTable('Timestamp\n1000\nlater\n'), FILE, opts)).rejects.toThrow(
      `Unparseable timestamp "later" on data row 2 of ${FILE}`,
    );
  });

  it('fails when the span is outside the tolerance', async () => {
    const err = await validateMetricsTable(withTable('Timestamp\n1000\n1100\n'), FILE, opts).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ValidationFailureError);
    expect(err).toHaveProperty('message', 'Run duration 100s is outside 480±10s');
  });
});
