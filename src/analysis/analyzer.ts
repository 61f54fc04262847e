/**
 * Orchestrates a set of named metrics over one dataset and aggregates their
 * results into an overall score, status and recommendations.
 */

import { secondsBetween } from '@/core/time';
import type { TabularDataset } from '@/data/types';
import { AccuracyMetric } from '@/metrics/accuracy';
import { CompletenessMetric } from '@/metrics/completeness';
import { ConsistencyMetric } from '@/metrics/consistency';
import { MetricRegistry, meanScore, runMetrics } from '@/metrics/runner';
import type { MetricResults } from '@/metrics/runner';
import { OVERALL_THRESHOLDS, classifyScore, formatPercent } from '@/metrics/thresholds';
import { TimelinessMetric } from '@/metrics/timeliness';
import type { Metric, MetricStatus } from '@/metrics/types';
import { createChildLogger } from '@/utils/logger';
import { buildRecommendations } from './recommendations';
import type { Recommendation } from './recommendations';

const logger = createChildLogger('analysis.analyzer');

export interface AnalysisResult {
  readonly overallScore: number;
  readonly overallStatus: MetricStatus;
  readonly metrics: MetricResults;
  readonly recommendations: readonly Recommendation[];
  readonly analysisTimeSeconds: number;
  /** ISO-8601 timestamp of when the analysis started. */
  readonly analysisDate: string;
}

export interface AnalyzerOptions {
  /** Metrics keyed by name, registered over the defaults; a default is replaced by a metric of the same name. */
  metrics?: Record<string, Metric>;
  /** Skip the default completeness, accuracy, consistency and timeliness metrics. */
  withoutDefaults?: boolean;
}

export function createDefaultMetrics(): Metric[] {
  return [
    new CompletenessMetric(),
    new AccuracyMetric(),
    new ConsistencyMetric(),
    new TimelinessMetric(),
  ];
}

export class Analyzer {
  private readonly metrics = new MetricRegistry('analyzer');
  private results: AnalysisResult | null = null;

  constructor(options: AnalyzerOptions = {}) {
    if (!options.withoutDefaults) {
      for (const metric of createDefaultMetrics()) {
        this.metrics.set(metric);
      }
    }
    for (const [name, metric] of Object.entries(options.metrics ?? {})) {
      this.metrics.set(metric, name);
    }
    logger.debug({ metrics: this.metrics.names() }, 'Initialized analyzer');
  }

  /** Registers a metric, replacing any metric already using the name. */
  addMetric(metric: Metric, name: string = metric.name): void {
    this.metrics.set(metric, name);
    logger.debug({ metric: name }, 'Added metric');
  }

  getMetric(name: string): Metric | undefined {
    return this.metrics.get(name);
  }

  getMetricNames(): string[] {
    return this.metrics.names();
  }

  get lastResults(): AnalysisResult | null {
    return this.results;
  }

  /**
   * Runs the named metrics (all when omitted) against the dataset.
   *
   * @throws NoMetricsConfiguredError when none of the requested metrics exist.
   */
  analyze(dataset: TabularDataset, metricNames?: readonly string[]): AnalysisResult {
    const selected = this.metrics.select(metricNames, logger);
    const startedAt = new Date();
    logger.info(
      { rows: dataset.rowCount, columns: dataset.columns.length, metrics: selected.map(([name]) => name) },
      'Starting analysis'
    );

    const metrics = runMetrics(selected, dataset, logger);
    const overallScore = meanScore(metrics);
    const recommendations = buildRecommendations(metrics, dataset);
    const analysisTimeSeconds = secondsBetween(startedAt, new Date());

    const result: AnalysisResult = {
      overallScore,
      overallStatus: classifyScore(overallScore, OVERALL_THRESHOLDS),
      metrics,
      recommendations,
      analysisTimeSeconds,
      analysisDate: startedAt.toISOString(),
    };
    this.results = result;

    logger.info(
      { overallScore: formatPercent(overallScore), durationSeconds: analysisTimeSeconds },
      'Analysis completed'
    );
    return result;
  }
}
