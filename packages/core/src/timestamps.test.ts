/**
 * Unit tests for timestamps.ts
 * Run with: npx tsx --test packages/core/src/timestamps.test.ts
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseFlexibleTimestamp, normalizeToUtc, compareNewestFirst } from './timestamps.js';

function iso(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

describe('parseFlexibleTimestamp', () => {
  it('should parse UTC strings with a Z suffix', () => {
    assert.equal(iso(parseFlexibleTimestamp('2023-10-26T00:00:00Z')), '2023-10-26T00:00:00.000Z');
    assert.equal(iso(parseFlexibleTimestamp('2023-07-15T20:38:13.044Z')), '2023-07-15T20:38:13.044Z');
    assert.equal(iso(parseFlexibleTimestamp('2024-01-01T12:00:00.123456Z')), '2024-01-01T12:00:00.123Z');
  });

  it('should apply explicit offsets', () => {
    assert.equal(iso(parseFlexibleTimestamp('2024-03-01T12:00:00+02:00')), '2024-03-01T10:00:00.000Z');
    assert.equal(iso(parseFlexibleTimestamp('2024-03-01T12:00:00-0530')), '2024-03-01T17:30:00.000Z');
  });

  it('should read naive ISO strings as UTC wall-clock', () => {
    assert.equal(iso(parseFlexibleTimestamp('2023-10-26T08:15:00')), '2023-10-26T08:15:00.000Z');
    assert.equal(iso(parseFlexibleTimestamp('2023-10-26')), '2023-10-26T00:00:00.000Z');
  });

  it('should accept the space separated fallback format', () => {
    assert.equal(iso(parseFlexibleTimestamp('2021-07-20 16:00:00')), '2021-07-20T16:00:00.000Z');
  });

  it('should return Date values unchanged', () => {
    const date = new Date('2020-05-05T05:05:05Z');
    assert.equal(parseFlexibleTimestamp(date), date);
  });

  it('should treat large numbers as milliseconds and small ones as seconds', () => {
    assert.equal(iso(parseFlexibleTimestamp(1700000000)), '2023-11-14T22:13:20.000Z');
    assert.equal(iso(parseFlexibleTimestamp(1700000000000)), '2023-11-14T22:13:20.000Z');
  });

  it('should return null for anything unparseable', () => {
    assert.equal(parseFlexibleTimestamp('not a date'), null);
    assert.equal(parseFlexibleTimestamp('2023-02-30T00:00:00Z'), null);
    assert.equal(parseFlexibleTimestamp('2023-10-26Z'), null);
    assert.equal(parseFlexibleTimestamp('2023-10-26T25:00:00'), null);
    assert.equal(parseFlexibleTimestamp(''), null);
    assert.equal(parseFlexibleTimestamp(undefined), null);
    assert.equal(parseFlexibleTimestamp(Number.NaN), null);
  });
});

describe('normalizeToUtc', () => {
  it('should turn invalid dates into null', () => {
    assert.equal(normalizeToUtc(new Date(Number.NaN)), null);
    assert.equal(normalizeToUtc(null), null);
  });

  it('should keep the instant of valid dates', () => {
    const date = new Date('2024-03-01T10:00:00Z');
    assert.equal(normalizeToUtc(date)?.getTime(), date.getTime());
  });
});

describe('compareNewestFirst', () => {
  it('should sort newest first with unknown timestamps last', () => {
    const older = new Date('2023-01-01T00:00:00Z');
    const newer = new Date('2024-01-01T00:00:00Z');
    const sorted = [null, older, newer].sort(compareNewestFirst);
    assert.deepEqual(sorted, [newer, older, null]);
  });
});
