/**
 * Unit tests for utils.ts
 * Run with: npx tsx --test packages/core/src/utils.test.ts
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { hashText, batch, withRetry, isRetriableError, parseRetryAfter, toFiniteNumber, formatDuration } from './utils.js';
import { HttpError } from './errors.js';

describe('hashText', () => {
  it('should hash the trimmed text with sha256', () => {
    assert.equal(hashText('abc'), 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    assert.equal(hashText('  abc\n'), hashText('abc'));
  });

  it('should distinguish different texts', () => {
    assert.notEqual(hashText('Will X happen?'), hashText('Will Y happen?'));
  });
});

describe('batch', () => {
  it('should split into chunks of the given size', () => {
    assert.deepEqual(batch([1, 2, 3, 4, 5], 2), [[1, 2], [3, 4], [5]]);
    assert.deepEqual(batch([], 3), []);
  });

  it('should reject sizes below one', () => {
    assert.throws(() => batch([1], 0), RangeError);
  });
});

describe('withRetry', () => {
  it('should retry retriable errors until success', async () => {
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new HttpError('unavailable', 503);
        return 'ok';
      },
      { maxAttempts: 5, baseDelayMs: 1, maxDelayMs: 2 }
    );
    assert.equal(result, 'ok');
    assert.equal(calls, 3);
  });

  it('should not retry client errors', async () => {
    let calls = 0;
    await assert.rejects(
      withRetry(
        async () => {
          calls++;
          throw new HttpError('not found', 404);
        },
        { maxAttempts: 5, baseDelayMs: 1 }
      ),
      HttpError
    );
    assert.equal(calls, 1);
  });

  it('should give up after maxAttempts', async () => {
    let calls = 0;
    await assert.rejects(
      withRetry(
        async () => {
          calls++;
          throw new HttpError('busy', 429);
        },
        { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 2 }
      ),
      /busy/
    );
    assert.equal(calls, 2);
  });
});

describe('isRetriableError', () => {
  it('should classify HTTP statuses and network failures', () => {
    assert.equal(isRetriableError(new HttpError('x', 500)), true);
    assert.equal(isRetriableError(new HttpError('x', 429)), true);
    assert.equal(isRetriableError(new HttpError('x', 401)), false);
    assert.equal(isRetriableError(new Error('fetch failed')), true);
    assert.equal(isRetriableError(new Error('bad json')), false);
  });
});

describe('parseRetryAfter', () => {
  it('should parse seconds', () => {
    assert.equal(parseRetryAfter('3'), 3);
    assert.equal(parseRetryAfter(null), undefined);
    assert.equal(parseRetryAfter('soon'), undefined);
  });
});

describe('toFiniteNumber', () => {
  it('should accept numbers and numeric strings only', () => {
    assert.equal(toFiniteNumber('12.5'), 12.5);
    assert.equal(toFiniteNumber(3), 3);
    assert.equal(toFiniteNumber('abc'), null);
    assert.equal(toFiniteNumber(''), null);
    assert.equal(toFiniteNumber(true), null);
    assert.equal(toFiniteNumber(null), null);
  });
});

describe('formatDuration', () => {
  it('should format ms, seconds and minutes', () => {
    assert.equal(formatDuration(250), '250ms');
    assert.equal(formatDuration(1500), '1.5s');
    assert.equal(formatDuration(125000), '2m 5s');
  });
});
