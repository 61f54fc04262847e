import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '@/core/errors';
import { createDataset } from '@/data/dataset';
import { AccuracyMetric, previewAllowedValues } from '@/metrics/accuracy';

const EMAIL_PATTERN = '[^@\\s]+@[^@\\s]+\\.[a-z]+';

const dataset = createDataset([
  { name: 'age', values: [25, -5, 120, 45, 30] },
  { name: 'email', values: ['a@b.com', 'invalid', 'c@d.com', 'e@f.com', null] },
  { name: 'status', values: ['new', 'open', 'closed', 'bogus', 'open'] },
  { name: 'name', values: ['Ana', 'Ben', 'Cy', 'Dee', 'Eve'] },
]);

describe('AccuracyMetric range checks', () => {
  it('counts values outside the bounds as invalid', () => {
    const metric = new AccuracyMetric();
    metric.addRangeCheck({ column: 'age', min: 0, max: 100 });
    const result = metric.evaluate(dataset);

    expect(result.details.age).toMatchObject({
      valid: 3,
      invalid: 2,
      accuracy: 0.6,
      status: 'failed',
      message: 'Range check (min: 0, max: 100): 2 values outside range',
    });
    expect(result.score).toBe(0.6);
    expect(result.message).toBe('2 of 5 checks failed (60.0% accuracy)');
  });

  it('marks every value of a non-numeric column invalid', () => {
    const metric = new AccuracyMetric();
    metric.addRangeCheck({ column: 'name', min: 0 });
    const { details } = metric.evaluate(dataset);

    expect(details.name.invalid).toBe(5);
    expect(details.name.message).toBe("Column 'name' is not numeric (kind: text)");
  });

  it('requires a bound and an ordered range', () => {
    const metric = new AccuracyMetric();
    expect(() => metric.addRangeCheck({ column: 'age' })).toThrow(
      'At least one of min or max must be specified'
    );
    expect(() => metric.addRangeCheck({ column: 'age', min: 10, max: 1 })).toThrow(ConfigurationError);
  });
});

describe('AccuracyMetric pattern checks', () => {
  it('skips missing values and counts mismatches', () => {
    const metric = new AccuracyMetric();
    metric.addPatternCheck({ column: 'email', pattern: EMAIL_PATTERN });
    const { details, score } = metric.evaluate(dataset);

    expect(details.email.valid).toBe(3);
    expect(details.email.invalid).toBe(1);
    expect(details.email.message).toBe(`Pattern check (${EMAIL_PATTERN}): 1 values don't match pattern`);
    expect(score).toBe(0.75);
  });

  it('matches the whole value, not just a prefix', () => {
    const metric = new AccuracyMetric();
    metric.addPatternCheck({ column: 'email', pattern: EMAIL_PATTERN });
    const trailing = createDataset([{ name: 'email', values: ['a@b.com', 'a@b.com!'] }]);

    expect(metric.evaluate(trailing).details.email.invalid).toBe(1);
  });

  it('rejects a pattern that does not compile', () => {
    expect(() => new AccuracyMetric().addPatternCheck({ column: 'email', pattern: '(' })).toThrow(
      ConfigurationError
    );
  });
});

describe('AccuracyMetric categorical checks', () => {
  it('counts values outside the allowed set', () => {
    const metric = new AccuracyMetric();
    metric.addCategoricalCheck({ column: 'status', allowedValues: ['new', 'open', 'closed'] });
    const { details } = metric.evaluate(dataset);

    expect(details.status.valid).toBe(4);
    expect(details.status.invalid).toBe(1);
    expect(details.status.message).toBe('Categorical check: 1 values not in allowed set [new, open, closed]');
  });

  it('rejects an empty allowed set', () => {
    expect(() => new AccuracyMetric().addCategoricalCheck({ column: 'status', allowedValues: [] })).toThrow(
      "Allowed values for 'status' cannot be empty"
    );
  });

  it('previews at most five allowed values', () => {
    expect(previewAllowedValues(new Set([1, 2, 3, 4, 5, 6, 7]))).toBe('[1, 2, 3, 4, 5, ...]');
  });
});

describe('AccuracyMetric scoring', () => {
  it('pools valid and invalid counts across all checks', () => {
    const metric = new AccuracyMetric();
    metric.addRangeCheck({ column: 'age', min: 0, max: 100 });
    metric.addPatternCheck({ column: 'email', pattern: EMAIL_PATTERN });
    metric.addCategoricalCheck({ column: 'status', allowedValues: ['new', 'open', 'closed'] });
    const result = metric.evaluate(dataset);

    expect(result.score).toBeCloseTo(10 / 14, 10);
    expect(result.status).toBe('warning');
    expect(result.message).toBe('4 of 14 checks failed (71.4% accuracy)');
    expect(Object.keys(result.details)).toEqual(['age', 'email', 'status']);
  });

  it('combines several kinds of check on one column', () => {
    const metric = new AccuracyMetric();
    metric.addRangeCheck({ column: 'points', max: 100 });
    metric.addCategoricalCheck({ column: 'points', allowedValues: [5, 50] });
    const points = createDataset([{ name: 'points', values: [5, 50, 500] }]);
    const detail = metric.evaluate(points).details.points;

    expect(detail.valid).toBe(4);
    expect(detail.invalid).toBe(2);
    expect(detail.checks).toHaveLength(2);
    expect(detail.message).toBe(
      'Range check (max: 100): 1 values outside range; Categorical check: 1 values not in allowed set [5, 50]'
    );
  });

  it('reports a missing column in its detail without failing the metric', () => {
    const metric = new AccuracyMetric();
    metric.addRangeCheck({ column: 'nope', min: 0 });
    const result = metric.evaluate(dataset);

    expect(result.details.nope.message).toBe("Column 'nope' not found in data");
    expect(result.score).toBe(1);
    expect(result.message).toBe('No values were available for the configured checks');
  });

  it('passes when no checks are configured', () => {
    const result = new AccuracyMetric().evaluate(dataset);
    expect(result).toMatchObject({ score: 1, status: 'passed', message: 'No accuracy checks configured' });
  });

  it('fails an empty dataset', () => {
    const metric = new AccuracyMetric();
    metric.addRangeCheck({ column: 'age', min: 0 });
    expect(metric.evaluate(null)).toMatchObject({ score: 0, status: 'failed', message: 'No data to evaluate' });
  });
});

describe('AccuracyMetric rule registry', () => {
  it('rejects a second check of the same kind on a column', () => {
    const metric = new AccuracyMetric();
    metric.addRangeCheck({ column: 'age', min: 0 });
    expect(() => metric.addRangeCheck({ column: 'age', max: 10 })).toThrow(
      "A rule named 'range:age' already exists in metric 'accuracy'"
    );
    expect(metric.checkCount).toBe(1);
  });

  it('is sealed by evaluation until cleared', () => {
    const metric = new AccuracyMetric();
    metric.addRangeCheck({ column: 'age', min: 0 });
    metric.evaluate(dataset);

    expect(() => metric.addPatternCheck({ column: 'email', pattern: EMAIL_PATTERN })).toThrow(
      ConfigurationError
    );

    metric.clear();
    metric.addPatternCheck({ column: 'email', pattern: EMAIL_PATTERN });
    expect(metric.checkCount).toBe(1);
  });

  it('returns identical results on repeated evaluation', () => {
    const metric = new AccuracyMetric();
    metric.addRangeCheck({ column: 'age', min: 0, max: 100 });
    expect(metric.evaluate(dataset)).toEqual(metric.evaluate(dataset));
  });
});
