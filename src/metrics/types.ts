import type { DatasetRow, TabularDataset } from '@/data/types';

export type MetricStatus = 'passed' | 'warning' | 'failed' | 'skipped';

export interface MetricThresholds {
  warningThreshold: number;
  failureThreshold: number;
}

interface MetricResultBase {
  readonly score: number;
  readonly status: MetricStatus;
  readonly message: string;
}

export interface ColumnCompleteness {
  readonly completeness: number;
  readonly status: MetricStatus;
  readonly message: string;
  readonly missingCount: number;
  readonly totalCount: number;
}

export interface CompletenessResult extends MetricResultBase {
  readonly type: 'completeness';
  readonly columns: Readonly<Record<string, ColumnCompleteness>>;
}

export type AccuracyCheckKind = 'range' | 'pattern' | 'categorical';

export interface AccuracyCheckOutcome {
  readonly check: AccuracyCheckKind;
  readonly valid: number;
  readonly invalid: number;
  readonly message: string;
}

export interface AccuracyColumnDetail {
  readonly valid: number;
  readonly invalid: number;
  readonly accuracy: number;
  readonly status: MetricStatus;
  readonly message: string;
  readonly checks: readonly AccuracyCheckOutcome[];
}

export interface AccuracyResult extends MetricResultBase {
  readonly type: 'accuracy';
  readonly details: Readonly<Record<string, AccuracyColumnDetail>>;
}

export type ConsistencyRuleKind = 'relationship' | 'comparison';

export interface ConsistencyRuleResult {
  readonly ruleType: ConsistencyRuleKind;
  readonly description: string;
  readonly consistentRows: number;
  readonly inconsistentRows: number;
  readonly consistencyScore: number;
  readonly status: MetricStatus;
  readonly examples: readonly DatasetRow[];
  readonly error?: string;
}

export interface ConsistencyResult extends MetricResultBase {
  readonly type: 'consistency';
  readonly rules: Readonly<Record<string, ConsistencyRuleResult>>;
}

export type TimelinessCheckKind = 'age' | 'freshness';

export interface TimelinessColumnDetail {
  readonly checkType: TimelinessCheckKind;
  readonly timely: number;
  readonly untimely: number;
  readonly nearingLimit: number;
  readonly timelinessScore: number;
  readonly maxAgeDays: number;
  readonly warningAgeDays: number;
  readonly oldestAgeDays: number | null;
  readonly status: MetricStatus;
  readonly message: string;
}

export interface TimelinessResult extends MetricResultBase {
  readonly type: 'timeliness';
  readonly referenceDate: string;
  readonly details: Readonly<Record<string, TimelinessColumnDetail>>;
}

/** Result shape for metrics implemented outside this package. */
export interface CustomMetricResult extends MetricResultBase {
  readonly type: 'custom';
  readonly details?: Readonly<Record<string, unknown>>;
}

/** Stand-in for a metric that threw during evaluation. */
export interface DegradedMetricResult extends MetricResultBase {
  readonly type: 'error';
  readonly error: string;
}

export type MetricResult =
  | CompletenessResult
  | AccuracyResult
  | ConsistencyResult
  | TimelinessResult
  | CustomMetricResult
  | DegradedMetricResult;

export interface Metric {
  readonly name: string;
  readonly warningThreshold: number;
  readonly failureThreshold: number;
  evaluate(dataset: TabularDataset | null): MetricResult;
  clear(): void;
}

export interface MetricOptions {
  name?: string;
  warningThreshold?: number;
  failureThreshold?: number;
}
