import { ConfigurationError } from '@/core/errors';
import { RelationalGrader } from './relational_grader';
import { SpreadsheetGrader } from './spreadsheet_grader';
import type { GraderType } from './types';

export const GRADER_TYPES: readonly GraderType[] = ['spreadsheet', 'relational'];

export function isGraderType(value: string): value is GraderType {
  return GRADER_TYPES.some((type) => type === value);
}

/**
 * Create a grader for the given source type.
 *
 * - spreadsheet: xlsx workbooks or in-memory sheets
 * - relational: SQLite databases
 */
export function createGrader(type: 'spreadsheet', name?: string): SpreadsheetGrader;
export function createGrader(type: 'relational', name?: string): RelationalGrader;
export function createGrader(type: string, name?: string): SpreadsheetGrader | RelationalGrader;
export function createGrader(type: string, name?: string): SpreadsheetGrader | RelationalGrader {
  switch (type) {
    case 'spreadsheet':
      return new SpreadsheetGrader(name);
    case 'relational':
      return new RelationalGrader(name);
    default:
      throw new ConfigurationError(`Unknown grader type: ${type}. Must be one of ${GRADER_TYPES.join(', ')}`);
  }
}

/** Picks the grader type for a source path by its extension or URL scheme. */
export function graderTypeForSource(source: string): GraderType {
  if (/\.(xlsx|xlsm)$/i.test(source)) return 'spreadsheet';
  if (source.startsWith('sqlite:') || /\.(db|sqlite|sqlite3)$/i.test(source)) return 'relational';
  throw new ConfigurationError(`Cannot tell the source type of '${source}'; expected an .xlsx workbook or a SQLite database`);
}
