import { countDuplicateRows } from '@/data/dataset';
import type { TabularDataset } from '@/data/types';
import type { MetricResults } from '@/metrics/runner';
import { formatPercent } from '@/metrics/thresholds';
import type {
  AccuracyResult,
  CompletenessResult,
  ConsistencyResult,
  MetricResult,
  MetricStatus,
} from '@/metrics/types';

export type RecommendationPriority = 'high' | 'medium' | 'low';

export interface Recommendation {
  readonly title: string;
  readonly priority: RecommendationPriority;
  readonly description: string;
  readonly steps: readonly string[];
  readonly affectedColumns?: readonly string[];
  readonly affectedMetrics?: readonly string[];
}

const MAX_AFFECTED_COLUMNS = 3;

function entriesOfType<T extends MetricResult['type']>(
  results: MetricResults,
  type: T
): [string, Extract<MetricResult, { type: T }>][] {
  const matches: [string, Extract<MetricResult, { type: T }>][] = [];
  for (const [name, result] of Object.entries(results)) {
    if (isResultOfType(result, type)) matches.push([name, result]);
  }
  return matches;
}

function isResultOfType<T extends MetricResult['type']>(
  result: MetricResult,
  type: T
): result is Extract<MetricResult, { type: T }> {
  return result.type === type;
}

function priorityFor(status: MetricStatus): RecommendationPriority {
  return status === 'failed' ? 'high' : 'medium';
}

function completenessRecommendation(name: string, result: CompletenessResult): Recommendation | null {
  if (result.status === 'passed') return null;
  const worst = Object.entries(result.columns)
    .filter(([, column]) => column.status !== 'passed')
    .sort((a, b) => a[1].completeness - b[1].completeness)
    .slice(0, MAX_AFFECTED_COLUMNS)
    .map(([column]) => column);
  if (worst.length === 0) return null;
  return {
    title: 'Improve Data Completeness',
    priority: priorityFor(result.status),
    description: `Address missing values in columns: ${worst.join(', ')}`,
    affectedMetrics: [name],
    affectedColumns: worst,
    steps: [
      'Identify the root cause of missing data',
      'Implement validation in data entry systems',
      'Consider backfilling missing historical data where possible',
    ],
  };
}

function consistencyRecommendation(name: string, result: ConsistencyResult): Recommendation | null {
  const violated = Object.entries(result.rules)
    .filter(([, rule]) => rule.ruleType === 'relationship' && rule.inconsistentRows > 0)
    .map(([rule]) => rule);
  if (violated.length === 0) return null;
  return {
    title: 'Enforce Data Relationships',
    priority: priorityFor(result.status),
    description: `Some relationships between columns are inconsistent (${violated.join(', ')}). Ensure proper constraints are enforced.`,
    affectedMetrics: [name],
    steps: [
      'Review relationship violations',
      'Add validation rules to prevent inconsistencies',
      'Fix existing inconsistent data',
    ],
  };
}

function accuracyRecommendation(name: string, result: AccuracyResult): Recommendation | null {
  if (result.status === 'passed') return null;
  const problems = Object.entries(result.details)
    .filter(([, detail]) => detail.invalid > 0)
    .sort((a, b) => a[1].accuracy - b[1].accuracy)
    .slice(0, MAX_AFFECTED_COLUMNS)
    .map(([column]) => column);
  if (problems.length === 0) return null;
  return {
    title: 'Fix Data Accuracy Issues',
    priority: priorityFor(result.status),
    description: `Address accuracy problems in columns: ${problems.join(', ')}`,
    affectedMetrics: [name],
    affectedColumns: problems,
    steps: [
      'Review invalid data values',
      'Implement stronger validation rules',
      'Consider standardizing data formats',
    ],
  };
}

function duplicateRecommendation(dataset: TabularDataset): Recommendation | null {
  if (dataset.rowCount === 0) return null;
  const duplicates = countDuplicateRows(dataset);
  if (duplicates === 0) return null;
  const share = duplicates / dataset.rowCount;
  return {
    title: 'Remove Duplicate Records',
    priority: share > 0.05 ? 'high' : share > 0.01 ? 'medium' : 'low',
    description: `Found ${duplicates} duplicate rows (${formatPercent(share)} of data)`,
    affectedMetrics: ['consistency'],
    steps: [
      'Implement unique constraints',
      'Review and remove duplicates',
      'Add validation to prevent duplicate creation',
    ],
  };
}

export const GENERIC_RECOMMENDATION: Recommendation = {
  title: 'Review Data Quality Results',
  priority: 'medium',
  description: 'Review the detailed metric results to identify specific areas for improvement.',
  steps: [
    'Focus on metrics with lower scores',
    'Create a data quality improvement plan',
    'Implement automated validation and monitoring',
  ],
};

/**
 * Derives action items from metric results and the dataset itself. Never
 * returns an empty list.
 */
export function buildRecommendations(results: MetricResults, dataset: TabularDataset): Recommendation[] {
  const recommendations: Recommendation[] = [];
  const push = (recommendation: Recommendation | null): void => {
    if (recommendation) recommendations.push(recommendation);
  };

  for (const [name, result] of entriesOfType(results, 'completeness')) {
    push(completenessRecommendation(name, result));
  }
  for (const [name, result] of entriesOfType(results, 'consistency')) {
    push(consistencyRecommendation(name, result));
  }
  for (const [name, result] of entriesOfType(results, 'accuracy')) {
    push(accuracyRecommendation(name, result));
  }
  push(duplicateRecommendation(dataset));

  if (recommendations.length === 0) {
    recommendations.push(GENERIC_RECOMMENDATION);
  }
  return recommendations;
}
