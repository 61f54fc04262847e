/**
 * Shared types for source graders.
 *
 * A grader binds a metric set to one external source (a workbook or a
 * database), exposes the units it can grade (sheets or tables) and runs the
 * metrics over the active unit.
 */
import type { MetricResults } from '@/metrics/runner';
import type { TabularDataset } from '@/data/types';
import type { Metric } from '@/metrics/types';

export type GraderType = 'spreadsheet' | 'relational';

interface SourceMetadataBase {
  activeUnit: string;
  rowCount: number;
  columnCount: number;
  columns: string[];
}

export interface SpreadsheetSourceMetadata extends SourceMetadataBase {
  type: 'spreadsheet';
  /** Null when the grader was connected to in-memory datasets. */
  filePath: string | null;
}

export interface RelationalSourceMetadata extends SourceMetadataBase {
  type: 'relational';
  /** Connection identifier with credentials masked. */
  connection: string;
  primaryKey: string[];
}

export type SourceMetadata = SpreadsheetSourceMetadata | RelationalSourceMetadata;

export interface GradeTiming {
  startTime: string;
  endTime: string;
  durationSeconds: number;
}

export interface GradeResult<TSource extends SourceMetadata = SourceMetadata> {
  metrics: MetricResults;
  metadata: {
    source: TSource;
    timing: GradeTiming;
  };
}

/** A grade result together with the dataset it was computed from. */
export interface GradedUnit<TSource extends SourceMetadata = SourceMetadata> {
  result: GradeResult<TSource>;
  dataset: TabularDataset;
}

export interface GraderSummary {
  name: string;
  type: GraderType;
  connected: boolean;
  activeUnit: string | null;
  metricsConfigured: number;
  lastRun: string | null;
  hasResults: boolean;
  metricsRun?: number;
  avgScore?: number;
}

export interface Grader<TInput, TSource extends SourceMetadata = SourceMetadata> {
  readonly name: string;
  readonly type: GraderType;
  readonly isConnected: boolean;
  readonly activeUnit: string | null;

  /** Opens the source, discarding any previous connection and results. */
  connect(source: TInput): Promise<true>;
  getAvailableUnits(): string[];
  setActiveUnit(unit: string): true;
  /** Materializes the active unit as a dataset. */
  getActiveData(): TabularDataset;
  grade(metricNames?: readonly string[]): GradeResult<TSource>;
  /** Same as grade(), also handing back the dataset that was read. */
  gradeWithData(metricNames?: readonly string[]): GradedUnit<TSource>;
  close(): void;

  addMetric(name: string, metric: Metric): void;
  removeMetric(name: string): void;
  getAvailableMetrics(): string[];
  getSummary(): GraderSummary;
}
