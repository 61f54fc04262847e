import { MetricEvaluationError } from '@/core/errors';
import { toDate } from '@/core/time';
import type { CellValue, ColumnKind } from '@/data/types';
import type { ComparisonOperator } from './types';

type Present = Exclude<CellValue, null>;

function describe(value: Present): string {
  if (value instanceof Date) return 'date';
  return typeof value === 'number' ? 'number' : typeof value;
}

/**
 * Orders two present values. Temporal values (or either side coming from a
 * temporal column) compare as dates, booleans compare as 0/1 against numbers,
 * text compares lexically. Returns null when the values cannot be ordered.
 */
export function orderValues(
  left: Present,
  right: Present,
  leftKind?: ColumnKind,
  rightKind?: ColumnKind
): number | null {
  const temporal =
    left instanceof Date ||
    right instanceof Date ||
    leftKind === 'temporal' ||
    rightKind === 'temporal';

  if (temporal) {
    const a = toDate(left);
    const b = toDate(right);
    if (!a || !b) return null;
    return a.getTime() - b.getTime();
  }

  const numericLike = (v: Present): v is number | boolean =>
    typeof v === 'number' || typeof v === 'boolean';
  if (numericLike(left) && numericLike(right)) {
    return Number(left) - Number(right);
  }

  if (typeof left === 'string' && typeof right === 'string') {
    if (left === right) return 0;
    return left < right ? -1 : 1;
  }

  return null;
}

export function applyOperator(order: number, operator: ComparisonOperator): boolean {
  switch (operator) {
    case '<':
      return order < 0;
    case '<=':
      return order <= 0;
    case '==':
      return order === 0;
    case '!=':
      return order !== 0;
    case '>=':
      return order >= 0;
    case '>':
      return order > 0;
  }
}

/**
 * Compares two present values with `operator`. Values that cannot be ordered
 * are unequal; asking for their order throws.
 */
export function compareValues(
  left: Present,
  operator: ComparisonOperator,
  right: Present,
  leftKind?: ColumnKind,
  rightKind?: ColumnKind
): boolean {
  const order = orderValues(left, right, leftKind, rightKind);
  if (order === null) {
    if (operator === '==') return false;
    if (operator === '!=') return true;
    throw new MetricEvaluationError(
      `Cannot compare ${describe(left)} '${String(left)}' with ${describe(right)} '${String(right)}' using '${operator}'`
    );
  }
  return applyOperator(order, operator);
}
