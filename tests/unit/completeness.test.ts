import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '@/core/errors';
import { createDataset } from '@/data/dataset';
import { CompletenessMetric } from '@/metrics/completeness';

const dataset = createDataset([
  { name: 'id', values: [1, 2, 3, 4, 5] },
  { name: 'email', values: ['a@x.io', null, 'c@x.io', null, 'e@x.io'] },
  { name: 'city', values: ['Graz', 'Linz', undefined, 'Wels', ''] },
]);

describe('CompletenessMetric', () => {
  it('scores the share of present cells across the dataset', () => {
    const metric = new CompletenessMetric({ warningThreshold: 0.9, failureThreshold: 0.7 });
    const result = metric.evaluate(dataset);

    expect(result.score).toBeCloseTo(11 / 15, 10);
    expect(result.status).toBe('warning');
    expect(result.message).toBe('Missing 4 of 15 values (73.3% complete)');
  });

  it('reports each column separately', () => {
    const metric = new CompletenessMetric({ warningThreshold: 0.9, failureThreshold: 0.7 });
    const { columns } = metric.evaluate(dataset);

    expect(columns.id).toEqual({
      completeness: 1,
      status: 'passed',
      message: 'All values present',
      missingCount: 0,
      totalCount: 5,
    });
    expect(columns.email.completeness).toBeCloseTo(0.6, 10);
    expect(columns.email.status).toBe('failed');
    expect(columns.city.message).toBe('Missing 2 of 5 values');
  });

  it('uses 0.8 / 0.6 by default', () => {
    const metric = new CompletenessMetric();
    expect(metric.warningThreshold).toBe(0.8);
    expect(metric.failureThreshold).toBe(0.6);
    expect(metric.evaluate(dataset).status).toBe('warning');
  });

  it('fails an empty dataset and lists its columns', () => {
    const empty = createDataset([{ name: 'a', values: [] }]);
    const result = new CompletenessMetric().evaluate(empty);

    expect(result.score).toBe(0);
    expect(result.status).toBe('failed');
    expect(result.message).toBe('No data to evaluate');
    expect(result.columns.a.status).toBe('failed');
  });

  it('fails an absent dataset', () => {
    const result = new CompletenessMetric().evaluate(null);
    expect(result).toMatchObject({ score: 0, status: 'failed', columns: {} });
  });

  it('rejects thresholds out of order or out of range', () => {
    expect(() => new CompletenessMetric({ warningThreshold: 0.5, failureThreshold: 0.6 })).toThrow(
      ConfigurationError
    );
    expect(() => new CompletenessMetric({ warningThreshold: 1.2 })).toThrow(
      'warningThreshold must be between 0 and 1, got 1.2'
    );
  });

  it('returns identical results on repeated evaluation', () => {
    const metric = new CompletenessMetric();
    expect(metric.evaluate(dataset)).toEqual(metric.evaluate(dataset));
  });
});
