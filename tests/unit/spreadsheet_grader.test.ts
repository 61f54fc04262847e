import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import ExcelJS from 'exceljs';
import {
  ConfigurationError,
  NoMetricsConfiguredError,
  NotConnectedError,
  SourceConnectionError,
  UnknownUnitError,
} from '@/core/errors';
import { createDataset, getColumnNames } from '@/data/dataset';
import { SpreadsheetGrader } from '@/graders/spreadsheet_grader';
import { normalizeCell } from '@/graders/workbook_reader';
import { CompletenessMetric } from '@/metrics/completeness';

let tempDir: string;
let workbookPath: string;

async function writeWorkbook(path: string): Promise<void> {
  const workbook = new ExcelJS.Workbook();

  const orders = workbook.addWorksheet('Orders');
  orders.addRow(['id', 'amount', 'email', 'ordered_on']);
  orders.addRow([1, 10.5, 'a@x.io', new Date(Date.UTC(2024, 0, 5))]);
  orders.addRow([null, null, null, null]);
  orders.addRow([2, null, 'b@x.io', new Date(Date.UTC(2024, 0, 6))]);
  orders.addRow([3, 7, null, new Date(Date.UTC(2024, 0, 7))]);

  const customers = workbook.addWorksheet('Customers');
  customers.addRow(['name', 'name', 'city']);
  customers.addRow(['Ana', 'Ann', 'Graz']);

  await workbook.xlsx.writeFile(path);
}

const first = createDataset([
  { name: 'id', values: [1, 2, 3, 4] },
  { name: 'code', values: ['a', 'b', null, 'b'] },
]);
const second = createDataset([{ name: 'total', values: [5, null] }]);

describe('SpreadsheetGrader with a workbook file', () => {
  beforeAll(async () => {
    tempDir = mkdtempSync(join(tmpdir(), 'spreadsheet-grader-'));
    workbookPath = join(tempDir, 'orders.xlsx');
    await writeWorkbook(workbookPath);
  });

  afterAll(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('lists sheets in workbook order and activates the first', async () => {
    const grader = new SpreadsheetGrader();
    await expect(grader.connect(workbookPath)).resolves.toBe(true);

    expect(grader.getAvailableUnits()).toEqual(['Orders', 'Customers']);
    expect(grader.activeUnit).toBe('Orders');
  });

  it('reads the header row as column names and drops blank rows', async () => {
    const grader = new SpreadsheetGrader();
    await grader.connect(workbookPath);
    const data = grader.getActiveData();

    expect(getColumnNames(data)).toEqual(['id', 'amount', 'email', 'ordered_on']);
    expect(data.rowCount).toBe(3);
  });

  it('suffixes repeated header names', async () => {
    const grader = new SpreadsheetGrader();
    await grader.connect(workbookPath);
    grader.setActiveUnit('Customers');

    expect(getColumnNames(grader.getActiveData())).toEqual(['name', 'name_2', 'city']);
  });

  it('describes the columns of a sheet', async () => {
    const grader = new SpreadsheetGrader();
    await grader.connect(workbookPath);
    const info = grader.getColumnInfo('Orders');

    expect(info.sheetName).toBe('Orders');
    expect(info.rowCount).toBe(3);
    expect(info.columnCount).toBe(4);
    expect(info.columns.amount).toEqual({
      kind: 'numeric',
      nullCount: 1,
      uniqueCount: 2,
      sampleValues: [10.5, 7],
    });
    expect(info.columns.ordered_on.kind).toBe('temporal');
  });

  it('grades the active sheet and describes the source', async () => {
    const grader = new SpreadsheetGrader();
    grader.addMetric('completeness', new CompletenessMetric());
    await grader.connect(workbookPath);
    const result = grader.grade();

    expect(result.metrics.completeness.score).toBeCloseTo(10 / 12, 10);
    expect(result.metadata.source).toEqual({
      type: 'spreadsheet',
      filePath: workbookPath,
      activeUnit: 'Orders',
      rowCount: 3,
      columnCount: 4,
      columns: ['id', 'amount', 'email', 'ordered_on'],
    });
    expect(result.metadata.timing.durationSeconds).toBeGreaterThanOrEqual(0);
  });

  it('wraps a missing file in a connection error', async () => {
    const grader = new SpreadsheetGrader();
    const missing = join(tempDir, 'missing.xlsx');

    await expect(grader.connect(missing)).rejects.toThrow(SourceConnectionError);
    await expect(grader.connect(missing)).rejects.toThrow(
      `Could not open spreadsheet source ${missing}: Workbook not found: ${missing}`
    );
    expect(grader.isConnected).toBe(false);
  });
});

describe('SpreadsheetGrader with in-memory datasets', () => {
  it('uses the record keys as sheet names', async () => {
    const grader = new SpreadsheetGrader('memory');
    grader.addMetric('completeness', new CompletenessMetric());
    await grader.connect({ first, second });
    grader.setActiveUnit('second');
    const result = grader.grade();

    expect(result.metadata.source.filePath).toBeNull();
    expect(result.metadata.source.activeUnit).toBe('second');
    expect(result.metrics.completeness.score).toBe(0.5);
  });

  it('rejects a source without sheets', async () => {
    await expect(new SpreadsheetGrader().connect({})).rejects.toThrow(
      'Spreadsheet source <in-memory datasets> has no sheets'
    );
  });

  it('requires a connection before use', () => {
    const grader = new SpreadsheetGrader();
    expect(() => grader.getAvailableUnits()).toThrow(NotConnectedError);
    expect(() => grader.grade()).toThrow(NotConnectedError);
  });

  it('rejects an unknown sheet', async () => {
    const grader = new SpreadsheetGrader();
    await grader.connect({ first, second });

    expect(() => grader.setActiveUnit('third')).toThrow(UnknownUnitError);
    expect(() => grader.setActiveUnit('third')).toThrow("Unit 'third' does not exist. Available: first, second");
  });

  it('requires metrics before grading', async () => {
    const grader = new SpreadsheetGrader();
    await grader.connect({ first });

    expect(() => grader.grade()).toThrow(NoMetricsConfiguredError);
    expect(() => grader.grade()).toThrow(
      "No metrics configured in grader 'spreadsheet_grader'. Add metrics first."
    );
  });

  it('manages its metric set by name', () => {
    const grader = new SpreadsheetGrader();
    grader.addMetric('completeness', new CompletenessMetric());
    grader.addMetric('strict', new CompletenessMetric({ warningThreshold: 0.99 }));

    expect(() => grader.addMetric('completeness', new CompletenessMetric())).toThrow(ConfigurationError);
    grader.removeMetric('strict');
    expect(grader.getAvailableMetrics()).toEqual(['completeness']);
    expect(() => grader.removeMetric('strict')).toThrow(
      "No metric named 'strict' exists in grader 'spreadsheet_grader'"
    );
  });

  it('summarizes its state before and after grading', async () => {
    const grader = new SpreadsheetGrader();
    grader.addMetric('completeness', new CompletenessMetric());
    await grader.connect({ first });

    expect(grader.getSummary()).toEqual({
      name: 'spreadsheet_grader',
      type: 'spreadsheet',
      connected: true,
      activeUnit: 'first',
      metricsConfigured: 1,
      lastRun: null,
      hasResults: false,
    });

    grader.grade();
    const summary = grader.getSummary();
    expect(summary.hasResults).toBe(true);
    expect(summary.metricsRun).toBe(1);
    expect(summary.avgScore).toBe(0.875);
    expect(summary.lastRun).not.toBeNull();
  });

  it('forgets previous results when reconnecting', async () => {
    const grader = new SpreadsheetGrader();
    grader.addMetric('completeness', new CompletenessMetric());
    await grader.connect({ first });
    grader.grade();
    await grader.connect({ second });

    expect(grader.lastResults).toBeNull();
    expect(grader.activeUnit).toBe('second');
  });

  it('disconnects on close', async () => {
    const grader = new SpreadsheetGrader();
    await grader.connect({ first });
    grader.close();

    expect(grader.isConnected).toBe(false);
    expect(() => grader.getActiveData()).toThrow(NotConnectedError);
  });
});

describe('normalizeCell', () => {
  it('flattens rich text, hyperlinks, formulas and errors', () => {
    expect(normalizeCell({ richText: [{ text: 'Hel' }, { text: 'lo' }] })).toBe('Hello');
    expect(normalizeCell({ text: 'docs', hyperlink: 'https://example.com' })).toBe('docs');
    expect(normalizeCell({ formula: 'A1*2', result: 14, date1904: false })).toBe(14);
    expect(normalizeCell({ error: '#N/A' })).toBeNull();
  });

  it('reads dates as the same wall-clock time in the local zone', () => {
    expect(normalizeCell(new Date(Date.UTC(2024, 0, 10, 15, 30)))).toEqual(new Date(2024, 0, 10, 15, 30));
  });
});
