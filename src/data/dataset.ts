/**
 * Construction and read helpers for TabularDataset.
 *
 * Values are normalized once here; metrics only read the result.
 */

import { ConfigurationError } from '@/core/errors';
import { isIsoDateString } from '@/core/time';
import type {
  CellValue,
  ColumnKind,
  ColumnSpec,
  DatasetColumn,
  DatasetRow,
  TabularDataset,
} from './types';

export function isMissing(value: CellValue | undefined): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Maps driver output onto CellValue. `undefined`, NaN, invalid dates and empty
 * strings become missing; bigints become numbers; buffers become base64 text.
 */
export function toCellValue(raw: unknown): CellValue {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === 'number') return Number.isNaN(raw) ? null : raw;
  if (typeof raw === 'bigint') return Number(raw);
  if (typeof raw === 'boolean') return raw;
  if (typeof raw === 'string') return raw.length === 0 ? null : raw;
  if (raw instanceof Date) return Number.isNaN(raw.getTime()) ? null : raw;
  if (Buffer.isBuffer(raw)) return raw.toString('base64');
  return String(raw);
}

export function inferColumnKind(values: readonly CellValue[]): ColumnKind {
  const present = values.filter((v): v is Exclude<CellValue, null> => !isMissing(v));
  if (present.length === 0) return 'text';
  if (present.every((v) => typeof v === 'number')) return 'numeric';
  if (present.every((v) => typeof v === 'boolean')) return 'boolean';
  if (present.every((v) => v instanceof Date || (typeof v === 'string' && isIsoDateString(v)))) {
    return 'temporal';
  }
  return 'text';
}

export function createDataset(specs: readonly ColumnSpec[]): TabularDataset {
  const seen = new Set<string>();
  let rowCount: number | null = null;
  const columns: DatasetColumn[] = [];

  for (const spec of specs) {
    if (seen.has(spec.name)) {
      throw new ConfigurationError(`Duplicate column name '${spec.name}'`);
    }
    seen.add(spec.name);

    if (rowCount !== null && spec.values.length !== rowCount) {
      throw new ConfigurationError(
        `Column '${spec.name}' has ${spec.values.length} values, expected ${rowCount}`
      );
    }
    rowCount = spec.values.length;

    const values = spec.values.map(toCellValue);
    columns.push({
      name: spec.name,
      kind: spec.kind ?? inferColumnKind(values),
      values,
    });
  }

  return { columns, rowCount: rowCount ?? 0 };
}

/**
 * Builds a dataset from row objects. Column order follows `columnOrder` when
 * given, otherwise first appearance across the records.
 */
export function datasetFromRecords(
  records: readonly Record<string, unknown>[],
  columnOrder?: readonly string[],
  kinds: Partial<Record<string, ColumnKind>> = {}
): TabularDataset {
  const names: string[] = columnOrder ? [...columnOrder] : [];
  if (!columnOrder) {
    const seen = new Set<string>();
    for (const record of records) {
      for (const key of Object.keys(record)) {
        if (!seen.has(key)) {
          seen.add(key);
          names.push(key);
        }
      }
    }
  }

  return createDataset(
    names.map((name) => ({
      name,
      values: records.map((record) => record[name]),
      kind: kinds[name],
    }))
  );
}

export function isEmptyDataset(dataset: TabularDataset | null | undefined): boolean {
  return !dataset || dataset.rowCount === 0 || dataset.columns.length === 0;
}

export function getColumn(dataset: TabularDataset, name: string): DatasetColumn | undefined {
  return dataset.columns.find((column) => column.name === name);
}

export function getColumnNames(dataset: TabularDataset): string[] {
  return dataset.columns.map((column) => column.name);
}

export function getRow(dataset: TabularDataset, index: number): DatasetRow {
  const row: DatasetRow = {};
  for (const column of dataset.columns) {
    row[column.name] = column.values[index] ?? null;
  }
  return row;
}

/** Identity of a cell for counting distinct values; keeps 1 and '1' apart. */
export function cellKey(value: CellValue): string {
  if (value === null) return 'null';
  if (value instanceof Date) return `d:${value.getTime()}`;
  return `${typeof value}:${String(value)}`;
}

/** Rows identical to an earlier row across every column. */
export function countDuplicateRows(dataset: TabularDataset): number {
  const seen = new Set<string>();
  let duplicates = 0;
  for (let i = 0; i < dataset.rowCount; i++) {
    const key = JSON.stringify(dataset.columns.map((column) => cellKey(column.values[i] ?? null)));
    if (seen.has(key)) {
      duplicates += 1;
    } else {
      seen.add(key);
    }
  }
  return duplicates;
}
