import { formatISO } from 'date-fns';
import { getCurrentDate, secondsBetween } from '@/core/time';
import type { TabularDataset } from '@/data/types';
import { MetricRegistry, meanScore, runMetrics } from '@/metrics/runner';
import type { MetricResults } from '@/metrics/runner';
import type { Metric } from '@/metrics/types';
import type { Logger } from '@/utils/logger';
import type { GradedUnit, GraderSummary, GraderType, SourceMetadata } from './types';

/**
 * Metric bookkeeping shared by the grader variants: the metric set, the last
 * run's results and the grading loop itself.
 */
export class GraderCore {
  readonly metrics: MetricRegistry;
  private results: MetricResults | null = null;
  private lastRun: Date | null = null;

  constructor(
    readonly name: string,
    readonly type: GraderType,
    private readonly log: Logger
  ) {
    this.metrics = new MetricRegistry(`grader '${name}'`);
  }

  addMetric(name: string, metric: Metric): void {
    this.metrics.add(metric, name);
    this.log.debug({ grader: this.name, metric: name }, 'Added metric');
  }

  removeMetric(name: string): void {
    this.metrics.remove(name);
    this.log.debug({ grader: this.name, metric: name }, 'Removed metric');
  }

  get lastResults(): MetricResults | null {
    return this.results;
  }

  resetResults(): void {
    this.results = null;
    this.lastRun = null;
  }

  /**
   * Selects the metrics first so a bad selection fails before any data is
   * read, then loads the dataset and runs them.
   */
  grade<TSource extends SourceMetadata>(
    metricNames: readonly string[] | undefined,
    load: () => TabularDataset,
    describe: (dataset: TabularDataset) => TSource
  ): GradedUnit<TSource> {
    const selected = this.metrics.select(metricNames, this.log);
    const start = getCurrentDate();
    const dataset = load();

    const metrics = runMetrics(selected, dataset, this.log);
    const end = getCurrentDate();
    const durationSeconds = secondsBetween(start, end);

    this.results = metrics;
    this.lastRun = end;
    this.log.info(
      { grader: this.name, metrics: Object.keys(metrics).length, durationSeconds },
      'Grading completed'
    );

    return {
      result: {
        metrics,
        metadata: {
          source: describe(dataset),
          timing: {
            startTime: formatISO(start),
            endTime: formatISO(end),
            durationSeconds,
          },
        },
      },
      dataset,
    };
  }

  summary(connected: boolean, activeUnit: string | null): GraderSummary {
    const summary: GraderSummary = {
      name: this.name,
      type: this.type,
      connected,
      activeUnit,
      metricsConfigured: this.metrics.size,
      lastRun: this.lastRun ? formatISO(this.lastRun) : null,
      hasResults: this.results !== null,
    };
    if (this.results) {
      summary.metricsRun = Object.keys(this.results).length;
      summary.avgScore = meanScore(this.results);
    }
    return summary;
  }
}
