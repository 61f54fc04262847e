import { MetricEvaluationError } from '@/core/errors';
import { getColumn, isMissing } from '@/data/dataset';
import type { CellValue, ColumnKind, DatasetColumn, TabularDataset } from '@/data/types';
import { compareValues } from './compare';
import { referencedColumns } from './parser';
import type { ComparisonOperator, Condition, Operand } from './types';

interface ResolvedOperand {
  value: CellValue;
  kind?: ColumnKind;
}

function resolveOperand(
  operand: Operand,
  columns: Map<string, DatasetColumn>,
  row: number
): ResolvedOperand {
  if (operand.type === 'literal') {
    return { value: operand.value };
  }
  const column = columns.get(operand.name);
  if (!column) {
    throw new MetricEvaluationError(`Unknown column '${operand.name}'`);
  }
  return { value: column.values[row] ?? null, kind: column.kind };
}

function compareOperands(
  left: ResolvedOperand,
  operator: ComparisonOperator,
  right: ResolvedOperand
): boolean {
  const leftMissing = isMissing(left.value);
  const rightMissing = isMissing(right.value);

  if (left.value === null && left.kind === undefined) {
    return nullComparison(operator, rightMissing);
  }
  if (right.value === null && right.kind === undefined) {
    return nullComparison(operator, leftMissing);
  }
  if (left.value === null || right.value === null) {
    return false;
  }
  return compareValues(left.value, operator, right.value, left.kind, right.kind);
}

/** `col == null` holds for missing cells, `col != null` for present ones. */
function nullComparison(operator: ComparisonOperator, otherMissing: boolean): boolean {
  if (operator === '==') return otherMissing;
  if (operator === '!=') return !otherMissing;
  throw new MetricEvaluationError(`Operator '${operator}' cannot be used with null`);
}

function isTruthy(value: CellValue): boolean {
  if (value === null) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') return value.length > 0;
  return true;
}

function evaluateRow(condition: Condition, columns: Map<string, DatasetColumn>, row: number): boolean {
  switch (condition.type) {
    case 'compare':
      return compareOperands(
        resolveOperand(condition.left, columns, row),
        condition.operator,
        resolveOperand(condition.right, columns, row)
      );
    case 'and':
      return evaluateRow(condition.left, columns, row) && evaluateRow(condition.right, columns, row);
    case 'or':
      return evaluateRow(condition.left, columns, row) || evaluateRow(condition.right, columns, row);
    case 'not':
      return !evaluateRow(condition.condition, columns, row);
    case 'truthy': {
      const column = columns.get(condition.column);
      if (!column) {
        throw new MetricEvaluationError(`Unknown column '${condition.column}'`);
      }
      return isTruthy(column.values[row] ?? null);
    }
  }
}

/**
 * Evaluates a condition for every row of the dataset.
 *
 * @throws MetricEvaluationError when the condition names columns the dataset
 * does not have, or compares values that have no common ordering.
 */
export function evaluateCondition(condition: Condition, dataset: TabularDataset): boolean[] {
  const columns = new Map<string, DatasetColumn>();
  const unknown: string[] = [];
  for (const name of referencedColumns(condition)) {
    const column = getColumn(dataset, name);
    if (column) {
      columns.set(name, column);
    } else {
      unknown.push(name);
    }
  }
  if (unknown.length > 0) {
    throw new MetricEvaluationError(`Unknown column(s) in expression: ${unknown.join(', ')}`);
  }

  const mask: boolean[] = [];
  for (let row = 0; row < dataset.rowCount; row++) {
    mask.push(evaluateRow(condition, columns, row));
  }
  return mask;
}
