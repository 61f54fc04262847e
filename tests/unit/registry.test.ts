import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '@/core/errors';
import { createGrader, graderTypeForSource, isGraderType } from '@/graders/registry';
import { RelationalGrader } from '@/graders/relational_grader';
import { SpreadsheetGrader } from '@/graders/spreadsheet_grader';

describe('createGrader', () => {
  it('builds a grader for each source type', () => {
    const spreadsheet = createGrader('spreadsheet');
    const relational = createGrader('relational', 'warehouse');

    expect(spreadsheet).toBeInstanceOf(SpreadsheetGrader);
    expect(spreadsheet.name).toBe('spreadsheet_grader');
    expect(relational).toBeInstanceOf(RelationalGrader);
    expect(relational.name).toBe('warehouse');
    expect(relational.type).toBe('relational');
  });

  it('rejects an unknown type', () => {
    expect(() => createGrader('csv')).toThrow('Unknown grader type: csv. Must be one of spreadsheet, relational');
  });
});

describe('graderTypeForSource', () => {
  it('recognizes workbooks and SQLite sources', () => {
    expect(graderTypeForSource('reports/q1.xlsx')).toBe('spreadsheet');
    expect(graderTypeForSource('Q1.XLSM')).toBe('spreadsheet');
    expect(graderTypeForSource('sqlite:///shop.db')).toBe('relational');
    expect(graderTypeForSource('/var/data/shop.sqlite3')).toBe('relational');
  });

  it('rejects anything else', () => {
    expect(() => graderTypeForSource('orders.csv')).toThrow(ConfigurationError);
  });
});

describe('isGraderType', () => {
  it('narrows known type names only', () => {
    expect(isGraderType('relational')).toBe(true);
    expect(isGraderType('graph')).toBe(false);
  });
});
