/**
 * Reads xlsx workbooks into datasets with exceljs.
 *
 * The first row of each sheet is the header. Formula cells contribute their
 * cached result, rich text and hyperlinks their text, error cells nothing.
 * Rows with no values at all are dropped. Date cells carry no zone; exceljs
 * hands them back as UTC, so they are moved onto the same wall-clock time in
 * the local zone, which is where reference dates live.
 */

import ExcelJS from 'exceljs';
import { createDataset } from '@/data/dataset';
import type { TabularDataset } from '@/data/types';

export function toLocalWallClock(value: Date): Date {
  const local = new Date(0);
  local.setFullYear(value.getUTCFullYear(), value.getUTCMonth(), value.getUTCDate());
  local.setHours(value.getUTCHours(), value.getUTCMinutes(), value.getUTCSeconds(), value.getUTCMilliseconds());
  return local;
}

export function normalizeCell(value: ExcelJS.CellValue): unknown {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return toLocalWallClock(value);
  if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if ('richText' in value) return value.richText.map((part) => part.text).join('');
  if ('hyperlink' in value) return value.text;
  if ('error' in value) return null;
  return normalizeCell(value.result ?? null);
}

function headerNames(sheet: ExcelJS.Worksheet): string[] {
  const header = sheet.getRow(1);
  const names: string[] = [];
  const used = new Map<string, number>();
  for (let col = 1; col <= header.cellCount; col++) {
    const raw = normalizeCell(header.getCell(col).value);
    const base = raw === null ? `column_${col}` : String(raw).trim() || `column_${col}`;
    const seen = used.get(base) ?? 0;
    used.set(base, seen + 1);
    names.push(seen === 0 ? base : `${base}_${seen + 1}`);
  }
  return names;
}

export function worksheetToDataset(sheet: ExcelJS.Worksheet): TabularDataset {
  const names = headerNames(sheet);
  const columns: unknown[][] = names.map(() => []);

  for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber++) {
    const row = sheet.getRow(rowNumber);
    const values = names.map((_, index) => normalizeCell(row.getCell(index + 1).value));
    if (values.every((value) => value === null || value === '')) continue;
    values.forEach((value, index) => columns[index].push(value));
  }

  return createDataset(names.map((name, index) => ({ name, values: columns[index] })));
}

/** Loads every worksheet, keyed by sheet name in workbook order. */
export async function readWorkbook(path: string): Promise<Map<string, TabularDataset>> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(path);

  const sheets = new Map<string, TabularDataset>();
  for (const sheet of workbook.worksheets) {
    sheets.set(sheet.name, worksheetToDataset(sheet));
  }
  return sheets;
}
