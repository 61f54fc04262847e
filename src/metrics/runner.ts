import { ConfigurationError, NoMetricsConfiguredError, errorMessage } from '@/core/errors';
import type { TabularDataset } from '@/data/types';
import type { Logger } from '@/utils/logger';
import type { DegradedMetricResult, Metric, MetricResult } from './types';

export type MetricResults = Record<string, MetricResult>;

/** Name-keyed, insertion-ordered collection of metrics. */
export class MetricRegistry {
  private metrics = new Map<string, Metric>();

  constructor(private readonly owner: string) {}

  /** Registers a metric, rejecting a name that is already taken. */
  add(metric: Metric, name: string = metric.name): void {
    if (this.metrics.has(name)) {
      throw new ConfigurationError(`A metric named '${name}' already exists in ${this.owner}`);
    }
    this.metrics.set(name, metric);
  }

  /** Registers a metric, replacing any metric of the same name. */
  set(metric: Metric, name: string = metric.name): void {
    this.metrics.set(name, metric);
  }

  remove(name: string): void {
    if (!this.metrics.delete(name)) {
      throw new ConfigurationError(`No metric named '${name}' exists in ${this.owner}`);
    }
  }

  get(name: string): Metric | undefined {
    return this.metrics.get(name);
  }

  has(name: string): boolean {
    return this.metrics.has(name);
  }

  names(): string[] {
    return Array.from(this.metrics.keys());
  }

  get size(): number {
    return this.metrics.size;
  }

  clear(): void {
    this.metrics.clear();
  }

  /**
   * Resolves the metrics to run, in the order requested. Unknown names are
   * logged and skipped; nothing left to run is an error.
   */
  select(names: readonly string[] | undefined, log: Logger): [string, Metric][] {
    if (this.metrics.size === 0) {
      throw new NoMetricsConfiguredError(`No metrics configured in ${this.owner}. Add metrics first.`);
    }
    if (!names || names.length === 0) {
      return Array.from(this.metrics.entries());
    }

    const selected: [string, Metric][] = [];
    for (const name of names) {
      const metric = this.metrics.get(name);
      if (metric) {
        selected.push([name, metric]);
      } else {
        log.warn({ metric: name, available: this.names() }, 'Requested metric not found');
      }
    }
    if (selected.length === 0) {
      throw new NoMetricsConfiguredError(
        `None of the requested metrics (${names.join(', ')}) are configured in ${this.owner}`
      );
    }
    return selected;
  }
}

export function degradedResult(error: unknown): DegradedMetricResult {
  const message = errorMessage(error);
  return {
    type: 'error',
    score: 0,
    status: 'failed',
    message: `Metric evaluation failed: ${message}`,
    error: message,
  };
}

/** Runs each metric against the dataset; a metric that throws yields a degraded entry. */
export function runMetrics(
  metrics: readonly [string, Metric][],
  dataset: TabularDataset,
  log: Logger
): MetricResults {
  const results: MetricResults = {};
  for (const [name, metric] of metrics) {
    const startedAt = Date.now();
    try {
      const result = metric.evaluate(dataset);
      results[name] = result;
      log.info(
        { metric: name, score: result.score, status: result.status, durationMs: Date.now() - startedAt },
        'Metric completed'
      );
    } catch (error) {
      log.error({ metric: name, error: errorMessage(error) }, 'Metric evaluation failed');
      results[name] = degradedResult(error);
    }
  }
  return results;
}

/** Mean of the scores that count towards an overall result; degraded and skipped entries are left out. */
export function meanScore(results: MetricResults): number {
  const scores = Object.values(results)
    .filter((result) => result.type !== 'error' && result.status !== 'skipped')
    .map((result) => result.score)
    .filter((score) => Number.isFinite(score) && score >= 0 && score <= 1);
  if (scores.length === 0) return 0;
  return scores.reduce((sum, score) => sum + score, 0) / scores.length;
}
