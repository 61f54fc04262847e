export type ComparisonOperator = '<' | '<=' | '==' | '!=' | '>=' | '>';

export const COMPARISON_OPERATORS: readonly ComparisonOperator[] = ['<', '<=', '==', '!=', '>=', '>'];

export type LiteralValue = number | string | boolean | null;

export type Operand =
  | { type: 'column'; name: string }
  | { type: 'literal'; value: LiteralValue };

/** Boolean row condition over dataset columns. */
export type Condition =
  | { type: 'compare'; left: Operand; operator: ComparisonOperator; right: Operand }
  | { type: 'and'; left: Condition; right: Condition }
  | { type: 'or'; left: Condition; right: Condition }
  | { type: 'not'; condition: Condition }
  | { type: 'truthy'; column: string };

export function isComparisonOperator(value: string): value is ComparisonOperator {
  return COMPARISON_OPERATORS.some((op) => op === value);
}
