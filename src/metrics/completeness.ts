import { isEmptyDataset, isMissing } from '@/data/dataset';
import type { TabularDataset } from '@/data/types';
import { createChildLogger } from '@/utils/logger';
import {
  DEFAULT_COMPLETENESS_THRESHOLDS,
  classifyScore,
  formatPercent,
  ratio,
  resolveThresholds,
} from './thresholds';
import type {
  ColumnCompleteness,
  CompletenessResult,
  Metric,
  MetricOptions,
  MetricThresholds,
} from './types';

const logger = createChildLogger('metrics.completeness');

/**
 * Share of non-missing cells, for the whole dataset and per column.
 */
export class CompletenessMetric implements Metric {
  readonly name: string;
  private readonly thresholds: MetricThresholds;

  constructor(options: MetricOptions = {}) {
    this.name = options.name ?? 'completeness';
    this.thresholds = resolveThresholds(
      DEFAULT_COMPLETENESS_THRESHOLDS,
      options.warningThreshold,
      options.failureThreshold
    );
  }

  get warningThreshold(): number {
    return this.thresholds.warningThreshold;
  }

  get failureThreshold(): number {
    return this.thresholds.failureThreshold;
  }

  evaluate(dataset: TabularDataset | null): CompletenessResult {
    if (!dataset || isEmptyDataset(dataset)) {
      const columns: Record<string, ColumnCompleteness> = {};
      for (const column of dataset?.columns ?? []) {
        columns[column.name] = {
          completeness: 0,
          status: 'failed',
          message: 'No values',
          missingCount: 0,
          totalCount: 0,
        };
      }
      return {
        type: 'completeness',
        score: 0,
        status: 'failed',
        message: 'No data to evaluate',
        columns,
      };
    }

    const columns: Record<string, ColumnCompleteness> = {};
    let missingCells = 0;

    for (const column of dataset.columns) {
      const missing = column.values.filter((value) => isMissing(value)).length;
      const completeness = ratio(dataset.rowCount - missing, dataset.rowCount, 0);
      missingCells += missing;

      columns[column.name] = {
        completeness,
        status: classifyScore(completeness, this.thresholds),
        message:
          missing === 0
            ? 'All values present'
            : `Missing ${missing} of ${dataset.rowCount} values`,
        missingCount: missing,
        totalCount: dataset.rowCount,
      };
    }

    const totalCells = dataset.rowCount * dataset.columns.length;
    const score = ratio(totalCells - missingCells, totalCells, 0);

    logger.debug({ metric: this.name, score, missingCells, totalCells }, 'Completeness evaluated');

    return {
      type: 'completeness',
      score,
      status: classifyScore(score, this.thresholds),
      message:
        missingCells === 0
          ? 'All values present'
          : `Missing ${missingCells} of ${totalCells} values (${formatPercent(score)} complete)`,
      columns,
    };
  }

  clear(): void {
    // Nothing configurable to reset.
  }
}
