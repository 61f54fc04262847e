/**
 * Descriptive statistics for a dataset and its columns.
 *
 * Every column gets counts of missing and distinct values plus a few samples.
 * Numeric, boolean and temporal columns add statistics of their own; text and
 * low-cardinality columns add their most frequent values.
 */

import { differenceInDays } from 'date-fns';
import { ConfigurationError } from '@/core/errors';
import { formatDate, toDate } from '@/core/time';
import { createChildLogger } from '@/utils/logger';
import { cellKey, countDuplicateRows, getColumn, isMissing } from './dataset';
import type { CellValue, ColumnKind, DatasetColumn, TabularDataset } from './types';

const logger = createChildLogger('data.profiler');

const SAMPLE_SIZE = 5;
const TOP_VALUE_COUNT = 10;
const MAX_CATEGORIES = 20;

export interface NumericProfile {
  min: number;
  max: number;
  mean: number;
  median: number;
  /** Sample standard deviation; null below two values. */
  std: number | null;
  quantile25: number;
  quantile75: number;
  zeroCount: number;
  negativeCount: number;
}

export interface BooleanProfile {
  trueCount: number;
  falseCount: number;
  truePercent: number;
  mostCommon: boolean;
}

export interface DateRangeProfile {
  minDate: string;
  maxDate: string;
  rangeDays: number;
}

export interface ValueCount {
  value: CellValue;
  count: number;
}

export interface ColumnProfile {
  name: string;
  kind: ColumnKind;
  count: number;
  missingCount: number;
  missingPercent: number;
  uniqueCount: number;
  /** Distinct values over present values. */
  uniquePercent: number;
  isCategorical: boolean;
  samples: CellValue[];
  numeric?: NumericProfile;
  boolean?: BooleanProfile;
  dates?: DateRangeProfile;
  /** Most frequent values, most common first; ties keep first appearance. */
  topValues?: ValueCount[];
}

export interface DatasetProfile {
  rowCount: number;
  columnCount: number;
  columnNames: string[];
  kinds: Partial<Record<ColumnKind, number>>;
  missingCells: number;
  missingPercent: number;
  duplicateRows: number;
  duplicatePercent: number;
  columns: Record<string, ColumnProfile>;
}

/** Linear interpolation between closest ranks over sorted values. */
export function quantile(sorted: readonly number[], q: number): number {
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

function numericProfile(values: readonly number[]): NumericProfile {
  const sorted = [...values].sort((a, b) => a - b);
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const std =
    values.length < 2
      ? null
      : Math.sqrt(values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (values.length - 1));

  return {
    min: sorted[0],
    max: sorted[sorted.length - 1],
    mean,
    median: quantile(sorted, 0.5),
    std,
    quantile25: quantile(sorted, 0.25),
    quantile75: quantile(sorted, 0.75),
    zeroCount: values.filter((v) => v === 0).length,
    negativeCount: values.filter((v) => v < 0).length,
  };
}

function booleanProfile(values: readonly boolean[]): BooleanProfile {
  const trueCount = values.filter((v) => v).length;
  const falseCount = values.length - trueCount;
  return {
    trueCount,
    falseCount,
    truePercent: trueCount / values.length,
    mostCommon: trueCount >= falseCount,
  };
}

function dateRangeProfile(values: readonly Exclude<CellValue, null>[]): DateRangeProfile | undefined {
  let min: Date | null = null;
  let max: Date | null = null;
  for (const value of values) {
    const date = toDate(value);
    if (!date) return undefined;
    if (!min || date < min) min = date;
    if (!max || date > max) max = date;
  }
  if (!min || !max) return undefined;
  return {
    minDate: formatDate(min),
    maxDate: formatDate(max),
    rangeDays: differenceInDays(max, min),
  };
}

function topValues(values: readonly Exclude<CellValue, null>[]): ValueCount[] {
  const counts = new Map<string, ValueCount>();
  for (const value of values) {
    const key = cellKey(value);
    const entry = counts.get(key);
    if (entry) {
      entry.count += 1;
    } else {
      counts.set(key, { value, count: 1 });
    }
  }
  // Array.prototype.sort is stable, so equal counts stay in first-seen order.
  return Array.from(counts.values())
    .sort((a, b) => b.count - a.count)
    .slice(0, TOP_VALUE_COUNT);
}

function describeColumn(column: DatasetColumn): ColumnProfile {
  const present = column.values.filter((v): v is Exclude<CellValue, null> => !isMissing(v));
  const count = column.values.length;
  const uniqueCount = new Set(present.map(cellKey)).size;
  const isCategorical = uniqueCount < Math.min(MAX_CATEGORIES, present.length / 10);

  const profile: ColumnProfile = {
    name: column.name,
    kind: column.kind,
    count,
    missingCount: count - present.length,
    missingPercent: count > 0 ? (count - present.length) / count : 0,
    uniqueCount,
    uniquePercent: present.length > 0 ? uniqueCount / present.length : 0,
    isCategorical,
    samples: present.slice(0, SAMPLE_SIZE),
  };
  if (present.length === 0) return profile;

  if (column.kind === 'numeric') {
    profile.numeric = numericProfile(present.filter((v): v is number => typeof v === 'number'));
  } else if (column.kind === 'boolean') {
    profile.boolean = booleanProfile(present.filter((v): v is boolean => typeof v === 'boolean'));
  } else if (column.kind === 'temporal') {
    profile.dates = dateRangeProfile(present);
  }
  if (isCategorical || column.kind === 'text') {
    profile.topValues = topValues(present);
  }
  return profile;
}

/** Profiles one column; raises when the dataset has no such column. */
export function profileColumn(dataset: TabularDataset, name: string): ColumnProfile {
  const column = getColumn(dataset, name);
  if (!column) {
    throw new ConfigurationError(`Column '${name}' not found in data`);
  }
  return describeColumn(column);
}

export function profileDataset(dataset: TabularDataset): DatasetProfile {
  const cellCount = dataset.rowCount * dataset.columns.length;
  logger.info({ rows: dataset.rowCount, columns: dataset.columns.length }, 'Profiling dataset');

  const kinds: Partial<Record<ColumnKind, number>> = {};
  const columns: Record<string, ColumnProfile> = {};
  let missingCells = 0;
  for (const column of dataset.columns) {
    const profile = describeColumn(column);
    columns[column.name] = profile;
    kinds[column.kind] = (kinds[column.kind] ?? 0) + 1;
    missingCells += profile.missingCount;
  }

  const duplicateRows = countDuplicateRows(dataset);
  return {
    rowCount: dataset.rowCount,
    columnCount: dataset.columns.length,
    columnNames: dataset.columns.map((column) => column.name),
    kinds,
    missingCells,
    missingPercent: cellCount > 0 ? missingCells / cellCount : 0,
    duplicateRows,
    duplicatePercent: dataset.rowCount > 0 ? duplicateRows / dataset.rowCount : 0,
    columns,
  };
}
