import { describe, expect, it } from 'vitest';
import {
  ContainsMetric,
  DEFAULT_THRESHOLD,
  ExactMatchMetric,
  Metric,
  type MetricScore,
  runMetric,
} from '../src/metrics/index.js';
import type { LLMTestCase } from '../src/types.js';

class FixedMetric extends Metric {
  readonly name = 'fixed';

  constructor(
    private readonly value: number | MetricScore,
    threshold?: number,
  ) {
    super({ threshold });
  }

  measure(): number | MetricScore {
    return this.value;
  }
}

class AsyncLengthMetric extends Metric {
  readonly name = 'length';

  async measure(tc: LLMTestCase): Promise<MetricScore> {
    await Promise.resolve();
    const length = tc.actualOutput?.length ?? 0;
    return { score: Math.min(length / 10, 1), reason: `${length} characters` };
  }
}

class BrokenMetric extends Metric {
  readonly name = 'broken';

  measure(): number {
    throw new RangeError('model unavailable');
  }
}

describe('Metric', () => {
  it('uses the default threshold', () => {
    expect(new FixedMetric(1).threshold).toBe(DEFAULT_THRESHOLD);
  });

  it('counts scores at the threshold as successful', () => {
    const metric = new FixedMetric(1, 0.7);
    expect(metric.isSuccessful(0.7)).toBe(true);
    expect(metric.isSuccessful(0.69)).toBe(false);
  });

  it('rejects a non-finite threshold', () => {
    expect(() => new FixedMetric(1, Number.NaN)).toThrow('threshold must be a finite number');
  });

  it('describes itself', () => {
    expect(String(new FixedMetric(1, 0.25))).toBe('FixedMetric(name="fixed", threshold=0.25)');
  });
});

describe('runMetric', () => {
  const tc: LLMTestCase = { input: 'q', actualOutput: 'hello' };

  it('wraps a bare number', async () => {
    expect(await runMetric(new FixedMetric(0.8), tc)).toEqual({
      score: 0.8,
      success: true,
      reason: null,
      error: null,
      threshold: 0.5,
    });
  });

  it('keeps the reason', async () => {
    expect(await runMetric(new FixedMetric({ score: 0.2, reason: 'too short' }), tc)).toEqual({
      score: 0.2,
      success: false,
      reason: 'too short',
      error: null,
      threshold: 0.5,
    });
  });

  it('awaits async metrics', async () => {
    expect(await runMetric(new AsyncLengthMetric(), tc)).toEqual({
      score: 0.5,
      success: true,
      reason: '5 characters',
      error: null,
      threshold: 0.5,
    });
  });

  it('judges success against an overriding threshold', async () => {
    expect(await runMetric(new FixedMetric(0.6), tc, 0.7)).toEqual({
      score: 0.6,
      success: false,
      reason: null,
      error: null,
      threshold: 0.7,
    });
  });

  it('records exceptions as failed outcomes', async () => {
    expect(await runMetric(new BrokenMetric(), tc)).toEqual({
      score: 0,
      success: false,
      reason: null,
      error: 'RangeError: model unavailable',
      threshold: 0.5,
    });
  });

  it('records non-finite scores as failed outcomes', async () => {
    const outcome = await runMetric(new FixedMetric(Number.POSITIVE_INFINITY), tc);
    expect(outcome.success).toBe(false);
    expect(outcome.score).toBe(0);
    expect(outcome.error).toBe('TypeError: fixed returned a non-finite score: Infinity');
  });
});

describe('ExactMatchMetric', () => {
  it('scores a match as 1', () => {
    const metric = new ExactMatchMetric();
    expect(metric.measure({ input: 'q', actualOutput: ' Paris\n', expectedOutput: 'Paris' })).toEqual(
      { score: 1, reason: 'Output matches the expected output' },
    );
  });

  it('scores a mismatch as 0', () => {
    const metric = new ExactMatchMetric();
    expect(metric.measure({ input: 'q', actualOutput: 'Lyon', expectedOutput: 'Paris' })).toEqual({
      score: 0,
      reason: 'Output "Lyon" does not match expected "Paris"',
    });
  });

  it('compares untrimmed output when asked', () => {
    const metric = new ExactMatchMetric({ trim: false });
    expect(metric.measure({ input: 'q', actualOutput: 'Paris ', expectedOutput: 'Paris' }).score).toBe(
      0,
    );
  });

  it('requires an expected output', () => {
    expect(() => new ExactMatchMetric({ name: 'exact' }).measure({ input: 'q' })).toThrow(
      'exact requires expectedOutput',
    );
  });

  it('truncates long values in the reason', () => {
    const metric = new ExactMatchMetric();
    const long = 'x'.repeat(200);
    const { reason } = metric.measure({ input: 'q', actualOutput: long, expectedOutput: 'y' });
    expect(reason).toBe(`Output "${'x'.repeat(49)}...${'x'.repeat(49)}" does not match expected "y"`);
  });
});

describe('ContainsMetric', () => {
  it('scores the fraction of phrases found', () => {
    const metric = new ContainsMetric(['paris', 'france', 'capital', 'seine']);
    expect(
      metric.measure({ input: 'q', actualOutput: 'Paris is the capital of France' }),
    ).toEqual({ score: 0.75, reason: 'Output is missing "seine"' });
  });

  it('reports when every phrase is present', () => {
    const metric = new ContainsMetric('Paris');
    expect(metric.measure({ input: 'q', actualOutput: 'paris' })).toEqual({
      score: 1,
      reason: 'Output contains every expected phrase',
    });
  });

  it('respects case sensitivity', () => {
    const metric = new ContainsMetric(['Paris', 'France'], { caseSensitive: true });
    expect(metric.measure({ input: 'q', actualOutput: 'paris, France' })).toEqual({
      score: 0.5,
      reason: 'Output is missing "Paris"',
    });
  });

  it('treats a missing output as empty', () => {
    expect(new ContainsMetric(['a', 'b']).measure({ input: 'q' })).toEqual({
      score: 0,
      reason: 'Output is missing "a", "b"',
    });
  });

  it('requires at least one phrase', () => {
    expect(() => new ContainsMetric([])).toThrow('ContainsMetric needs at least one phrase');
  });
});
