import { describe, expect, it } from 'vitest';
import {
  describeOrigin,
  descriptiveResultId,
  opaqueResultId,
  originFromStack,
  MAX_LABEL_LENGTH,
  ResultIdGenerator,
  toPathSafeLabel,
} from '../src/storage/identifier.js';

const OPAQUE_ID = /^\d+-[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

const STACK = [
  'Error',
  '    at describeOrigin (/work/proj/src/storage/identifier.ts:92:31)',
  '    at LocalStorage.save (/work/proj/src/storage/local.ts:80:29)',
  '    at /work/proj/tests/integration/checkout-flow.test.ts:14:22',
  '    at runTest (file:///work/proj/node_modules/@vitest/runner/dist/index.js:781:11)',
].join('\n');

describe('toPathSafeLabel', () => {
  it('keeps safe characters', () => {
    expect(toPathSafeLabel('answer_relevancy.v2-final')).toBe('answer_relevancy.v2-final');
  });

  it('replaces unsafe characters', () => {
    expect(toPathSafeLabel('What is it? a/b')).toBe('What_is_it__a_b');
  });

  it('falls back to unknown for empty labels', () => {
    expect(toPathSafeLabel('')).toBe('unknown');
    expect(toPathSafeLabel('   ')).toBe('unknown');
    expect(toPathSafeLabel(null)).toBe('unknown');
    expect(toPathSafeLabel(undefined)).toBe('unknown');
  });

  it('does not produce dot-only labels', () => {
    expect(toPathSafeLabel('..')).toBe('__');
  });

  it('caps long labels', () => {
    const label = toPathSafeLabel('What is DeepEval? '.repeat(20));
    expect(label).toHaveLength(MAX_LABEL_LENGTH);
    expect(label.startsWith('What_is_DeepEval__What_is')).toBe(true);
  });
});

describe('opaqueResultId', () => {
  it('has the timestamp-uuid shape', () => {
    const id = opaqueResultId(1700000000000);
    expect(id).toMatch(OPAQUE_ID);
    expect(id.startsWith('1700000000000-')).toBe(true);
  });

  it('is unique for the same timestamp', () => {
    const ids = new Set(Array.from({ length: 50 }, () => opaqueResultId(1)));
    expect(ids.size).toBe(50);
  });
});

describe('descriptiveResultId', () => {
  it('joins the labels and the timestamp', () => {
    const id = descriptiveResultId(
      { testFile: 'checkout', testType: 'integration', testSubject: 'refund' },
      1700000000000,
    );
    expect(id).toBe('checkout-integration-refund-1700000000000');
  });
});

describe('originFromStack', () => {
  it('finds the first test file frame', () => {
    expect(originFromStack(STACK)).toEqual({
      testFile: 'checkout-flow',
      testType: 'integration',
    });
  });

  it('classifies other test files as unit', () => {
    const stack = 'Error\n    at Object.<anonymous> (/work/proj/tests/scoring.spec.ts:3:9)';
    expect(originFromStack(stack)).toEqual({ testFile: 'scoring', testType: 'unit' });
  });

  it('accepts test_ prefixed files', () => {
    const stack = 'Error\n    at file:///work/proj/test_storage.mjs:10:1';
    expect(originFromStack(stack)).toEqual({ testFile: 'test_storage', testType: 'unit' });
  });

  it('ignores frames inside node_modules', () => {
    const stack = 'Error\n    at x (/work/proj/node_modules/pkg/lib/thing.test.js:1:1)';
    expect(originFromStack(stack)).toEqual({ testFile: 'unknown', testType: 'unknown' });
  });

  it('falls back to unknown without a stack', () => {
    expect(originFromStack(undefined)).toEqual({ testFile: 'unknown', testType: 'unknown' });
  });
});

describe('describeOrigin', () => {
  it('uses the first test case name as subject', () => {
    const origin = describeOrigin([{ name: 'greeting', input: 'hi' }, { input: 'bye' }], {
      stack: STACK,
    });
    expect(origin).toEqual({
      testFile: 'checkout-flow',
      testType: 'integration',
      testSubject: 'greeting',
    });
  });

  it('falls back to unknown when the first case has no name', () => {
    const origin = describeOrigin([{ input: 'hi' }], { stack: 'Error' });
    expect(origin).toEqual({ testFile: 'unknown', testType: 'unknown', testSubject: 'unknown' });
  });

  it('prefers explicit labels and sanitizes them', () => {
    const origin = describeOrigin([{ name: 'ignored', input: 'hi' }], {
      origin: { testFile: 'nightly run', testType: 'e2e', testSubject: 'q&a' },
      stack: STACK,
    });
    expect(origin).toEqual({ testFile: 'nightly_run', testType: 'e2e', testSubject: 'q_a' });
  });

  it('derives labels from the live call stack', () => {
    const origin = describeOrigin([{ name: 'live', input: 'hi' }]);
    expect(origin).toEqual({ testFile: 'identifier', testType: 'unit', testSubject: 'live' });
  });
});

describe('ResultIdGenerator', () => {
  it('defaults to opaque ids without an origin', () => {
    const generator = new ResultIdGenerator();
    const { resultId, origin } = generator.next(42, [{ name: 'x', input: 'y' }]);
    expect(generator.strategy).toBe('opaque');
    expect(resultId).toMatch(OPAQUE_ID);
    expect(origin).toBeNull();
  });

  it('produces descriptive ids', () => {
    const generator = new ResultIdGenerator('descriptive');
    const { resultId, origin } = generator.next(42, [{ name: 'refund', input: 'y' }], {
      stack: STACK,
    });
    expect(resultId).toBe('checkout-flow-integration-refund-42');
    expect(origin).toEqual({
      testFile: 'checkout-flow',
      testType: 'integration',
      testSubject: 'refund',
    });
  });

  it('keeps descriptive ids short enough for a file name', () => {
    const generator = new ResultIdGenerator('descriptive');
    const { resultId } = generator.next(1700000000000, [{ name: 'x'.repeat(300), input: 'q' }], {
      origin: { testFile: 'f'.repeat(300), testType: 't'.repeat(300) },
    });
    expect(resultId).toBe(
      `${'f'.repeat(64)}-${'t'.repeat(64)}-${'x'.repeat(64)}-1700000000000`,
    );
    expect(Buffer.byteLength(`${resultId}.json`)).toBeLessThan(255);
  });

  it('produces descriptive ids with unknown labels when given no origin', () => {
    const generator = new ResultIdGenerator('descriptive');
    expect(generator.generate(7, null)).toBe('unknown-unknown-unknown-7');
  });
});
