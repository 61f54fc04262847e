import { existsSync } from 'fs';
import {
  NoActiveUnitError,
  NotConnectedError,
  SourceConnectionError,
  UnknownUnitError,
  errorMessage,
} from '@/core/errors';
import { cellKey, getColumnNames, isMissing } from '@/data/dataset';
import type { CellValue, ColumnKind, TabularDataset } from '@/data/types';
import type { MetricResults } from '@/metrics/runner';
import type { Metric } from '@/metrics/types';
import { createChildLogger } from '@/utils/logger';
import { GraderCore } from './grader_core';
import type { GradeResult, GradedUnit, Grader, GraderSummary, SpreadsheetSourceMetadata } from './types';
import { readWorkbook } from './workbook_reader';

const logger = createChildLogger('graders.spreadsheet');

const SAMPLE_SIZE = 5;

/** Path to an .xlsx file, or datasets keyed by sheet name. */
export type SpreadsheetSource = string | Readonly<Record<string, TabularDataset>>;

export interface SheetColumnInfo {
  kind: ColumnKind;
  nullCount: number;
  uniqueCount: number;
  sampleValues: CellValue[];
}

export interface SheetInfo {
  sheetName: string;
  rowCount: number;
  columnCount: number;
  columns: Record<string, SheetColumnInfo>;
}

export class SpreadsheetGrader implements Grader<SpreadsheetSource, SpreadsheetSourceMetadata> {
  readonly type = 'spreadsheet';
  private readonly core: GraderCore;
  private sheets = new Map<string, TabularDataset>();
  private filePath: string | null = null;
  private connected = false;
  private active: string | null = null;

  constructor(readonly name: string = 'spreadsheet_grader') {
    this.core = new GraderCore(name, 'spreadsheet', logger);
  }

  get isConnected(): boolean {
    return this.connected;
  }

  get activeUnit(): string | null {
    return this.active;
  }

  get lastResults(): MetricResults | null {
    return this.core.lastResults;
  }

  private reset(): void {
    this.sheets = new Map();
    this.filePath = null;
    this.connected = false;
    this.active = null;
    this.core.resetResults();
  }

  /** Indexes every sheet of the source and makes the first one active. */
  async connect(source: SpreadsheetSource): Promise<true> {
    this.reset();
    const label = typeof source === 'string' ? source : '<in-memory datasets>';

    let sheets: Map<string, TabularDataset>;
    try {
      if (typeof source === 'string') {
        if (!existsSync(source)) {
          throw new Error(`Workbook not found: ${source}`);
        }
        sheets = await readWorkbook(source);
      } else {
        sheets = new Map(Object.entries(source));
      }
    } catch (error) {
      logger.error({ source: label, error: errorMessage(error) }, 'Could not open workbook');
      throw new SourceConnectionError(
        `Could not open spreadsheet source ${label}: ${errorMessage(error)}`,
        'spreadsheet',
        label,
        error instanceof Error ? error : undefined
      );
    }

    const [first] = sheets.keys();
    if (first === undefined) {
      throw new SourceConnectionError(
        `Spreadsheet source ${label} has no sheets`,
        'spreadsheet',
        label
      );
    }

    this.sheets = sheets;
    this.filePath = typeof source === 'string' ? source : null;
    this.connected = true;
    this.active = first;
    logger.info({ source: label, sheets: Array.from(sheets.keys()), activeSheet: first }, 'Connected to workbook');
    return true;
  }

  getAvailableUnits(): string[] {
    if (!this.connected) throw new NotConnectedError(this.name);
    return Array.from(this.sheets.keys());
  }

  setActiveUnit(sheet: string): true {
    if (!this.connected) throw new NotConnectedError(this.name);
    if (!this.sheets.has(sheet)) {
      throw new UnknownUnitError(sheet, Array.from(this.sheets.keys()));
    }
    this.active = sheet;
    logger.debug({ grader: this.name, sheet }, 'Set active sheet');
    return true;
  }

  private requireSheet(sheet?: string): { name: string; dataset: TabularDataset } {
    if (!this.connected) throw new NotConnectedError(this.name);
    const name = sheet ?? this.active;
    if (name === null) throw new NoActiveUnitError(this.name);
    const dataset = this.sheets.get(name);
    if (!dataset) throw new UnknownUnitError(name, Array.from(this.sheets.keys()));
    return { name, dataset };
  }

  /** Per-column kind, null count, distinct count and up to five sample values. */
  getColumnInfo(sheet?: string): SheetInfo {
    const { name, dataset } = this.requireSheet(sheet);
    const columns: Record<string, SheetColumnInfo> = {};
    for (const column of dataset.columns) {
      const present = column.values.filter((v): v is Exclude<CellValue, null> => !isMissing(v));
      columns[column.name] = {
        kind: column.kind,
        nullCount: dataset.rowCount - present.length,
        uniqueCount: new Set(present.map(cellKey)).size,
        sampleValues: present.slice(0, SAMPLE_SIZE),
      };
    }
    return {
      sheetName: name,
      rowCount: dataset.rowCount,
      columnCount: dataset.columns.length,
      columns,
    };
  }

  getActiveData(): TabularDataset {
    return this.requireSheet().dataset;
  }

  grade(metricNames?: readonly string[]): GradeResult<SpreadsheetSourceMetadata> {
    return this.gradeWithData(metricNames).result;
  }

  gradeWithData(metricNames?: readonly string[]): GradedUnit<SpreadsheetSourceMetadata> {
    const { name, dataset } = this.requireSheet();
    return this.core.grade<SpreadsheetSourceMetadata>(
      metricNames,
      () => dataset,
      (graded) => ({
        type: 'spreadsheet',
        filePath: this.filePath,
        activeUnit: name,
        rowCount: graded.rowCount,
        columnCount: graded.columns.length,
        columns: getColumnNames(graded),
      })
    );
  }

  close(): void {
    this.sheets = new Map();
    this.connected = false;
    this.active = null;
    logger.debug({ grader: this.name }, 'Closed workbook');
  }

  addMetric(name: string, metric: Metric): void {
    this.core.addMetric(name, metric);
  }

  removeMetric(name: string): void {
    this.core.removeMetric(name);
  }

  getAvailableMetrics(): string[] {
    return this.core.metrics.names();
  }

  getSummary(): GraderSummary {
    return this.core.summary(this.connected, this.active);
  }
}
