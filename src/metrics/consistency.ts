import { ConfigurationError, errorMessage } from '@/core/errors';
import { getColumn, getRow, isEmptyDataset, isMissing } from '@/data/dataset';
import type { ColumnKind, DatasetRow, TabularDataset } from '@/data/types';
import { createChildLogger } from '@/utils/logger';
import { compareValues } from './expressions/compare';
import { evaluateCondition } from './expressions/evaluator';
import { formatCondition, parseCondition } from './expressions/parser';
import type { ComparisonOperator, Condition } from './expressions/types';
import { COMPARISON_OPERATORS, isComparisonOperator } from './expressions/types';
import { RuleRegistry } from './rule_registry';
import {
  DEFAULT_RULE_THRESHOLDS,
  classifyScore,
  formatPercent,
  ratio,
  resolveThresholds,
} from './thresholds';
import type {
  ConsistencyResult,
  ConsistencyRuleResult,
  Metric,
  MetricOptions,
  MetricThresholds,
} from './types';

const logger = createChildLogger('metrics.consistency');

const MAX_EXAMPLES = 5;

type ConsistencyRule =
  | { kind: 'relationship'; description: string; condition: Condition; implies: Condition }
  | {
      kind: 'comparison';
      description: string;
      leftColumn: string;
      operator: ComparisonOperator;
      rightColumn: string;
    };

interface RuleTally {
  consistentRows: number;
  inconsistentRows: number;
  consistencyScore: number;
  examples: DatasetRow[];
  error?: string;
}

function toCondition(expression: string | Condition): { condition: Condition; text: string } {
  if (typeof expression === 'string') {
    return { condition: parseCondition(expression), text: expression.trim() };
  }
  return { condition: expression, text: formatCondition(expression) };
}

function comparableKinds(left: ColumnKind, right: ColumnKind): boolean {
  if (left === right) return true;
  const numericLike = (kind: ColumnKind): boolean => kind === 'numeric' || kind === 'boolean';
  return numericLike(left) && numericLike(right);
}

function failedTally(error: string): RuleTally {
  return { consistentRows: 0, inconsistentRows: 0, consistencyScore: 0, examples: [], error };
}

/**
 * Cross-column rules: implications between row conditions and pairwise
 * column comparisons. The metric score is the unweighted mean of rule scores.
 */
export class ConsistencyMetric implements Metric {
  readonly name: string;
  private readonly thresholds: MetricThresholds;
  private readonly rules: RuleRegistry<ConsistencyRule>;

  constructor(options: MetricOptions = {}) {
    this.name = options.name ?? 'consistency';
    this.thresholds = resolveThresholds(
      DEFAULT_RULE_THRESHOLDS,
      options.warningThreshold,
      options.failureThreshold
    );
    this.rules = new RuleRegistry(this.name);
  }

  get warningThreshold(): number {
    return this.thresholds.warningThreshold;
  }

  get failureThreshold(): number {
    return this.thresholds.failureThreshold;
  }

  get ruleCount(): number {
    return this.rules.size;
  }

  /**
   * Requires `implies` to hold on every row where `condition` holds.
   * Expressions are parsed here, so syntax errors surface immediately.
   */
  addRelationshipCheck(
    name: string,
    condition: string | Condition,
    implies: string | Condition
  ): void {
    if (!name) throw new ConfigurationError('Relationship check requires a name');
    const parsedCondition = toCondition(condition);
    const parsedImplies = toCondition(implies);
    this.rules.add(name, {
      kind: 'relationship',
      description: `If ${parsedCondition.text} then ${parsedImplies.text}`,
      condition: parsedCondition.condition,
      implies: parsedImplies.condition,
    });
    logger.debug(
      { rule: name, condition: parsedCondition.text, implies: parsedImplies.text },
      'Added relationship rule'
    );
  }

  addComparisonCheck(
    name: string,
    leftColumn: string,
    operator: string,
    rightColumn: string
  ): void {
    if (!name) throw new ConfigurationError('Comparison check requires a name');
    if (!leftColumn || !rightColumn) {
      throw new ConfigurationError(`Comparison check '${name}' requires both columns`);
    }
    if (!isComparisonOperator(operator)) {
      throw new ConfigurationError(
        `Invalid operator: ${operator}. Must be one of ${COMPARISON_OPERATORS.join(', ')}`
      );
    }
    this.rules.add(name, {
      kind: 'comparison',
      description: `${leftColumn} ${operator} ${rightColumn}`,
      leftColumn,
      operator,
      rightColumn,
    });
    logger.debug({ rule: name, leftColumn, operator, rightColumn }, 'Added comparison rule');
  }

  private evaluateRelationship(
    dataset: TabularDataset,
    rule: Extract<ConsistencyRule, { kind: 'relationship' }>
  ): RuleTally {
    const conditionMask = evaluateCondition(rule.condition, dataset);
    const impliesMask = evaluateCondition(rule.implies, dataset);

    let applicable = 0;
    let inconsistent = 0;
    const examples: DatasetRow[] = [];
    for (let row = 0; row < dataset.rowCount; row++) {
      if (!conditionMask[row]) continue;
      applicable += 1;
      if (!impliesMask[row]) {
        inconsistent += 1;
        if (examples.length < MAX_EXAMPLES) examples.push(getRow(dataset, row));
      }
    }

    return {
      consistentRows: applicable - inconsistent,
      inconsistentRows: inconsistent,
      consistencyScore: ratio(applicable - inconsistent, applicable, 1),
      examples,
    };
  }

  private evaluateComparison(
    dataset: TabularDataset,
    rule: Extract<ConsistencyRule, { kind: 'comparison' }>
  ): RuleTally {
    const left = getColumn(dataset, rule.leftColumn);
    const right = getColumn(dataset, rule.rightColumn);
    if (!left || !right) {
      const missing = [left ? null : rule.leftColumn, right ? null : rule.rightColumn].filter(
        (name): name is string => name !== null
      );
      return failedTally(`Missing columns: ${missing.join(', ')}`);
    }
    if (!comparableKinds(left.kind, right.kind)) {
      return failedTally(
        `Cannot compare column '${left.name}' (${left.kind}) with column '${right.name}' (${right.kind})`
      );
    }

    let evaluated = 0;
    let inconsistent = 0;
    const examples: DatasetRow[] = [];
    for (let row = 0; row < dataset.rowCount; row++) {
      const a = left.values[row] ?? null;
      const b = right.values[row] ?? null;
      if (isMissing(a) || isMissing(b)) continue;
      evaluated += 1;
      if (!compareValues(a, rule.operator, b, left.kind, right.kind)) {
        inconsistent += 1;
        if (examples.length < MAX_EXAMPLES) examples.push(getRow(dataset, row));
      }
    }

    return {
      consistentRows: evaluated - inconsistent,
      inconsistentRows: inconsistent,
      consistencyScore: ratio(evaluated - inconsistent, evaluated, 1),
      examples,
    };
  }

  private evaluateRule(dataset: TabularDataset, name: string, rule: ConsistencyRule): ConsistencyRuleResult {
    let tally: RuleTally;
    try {
      tally =
        rule.kind === 'relationship'
          ? this.evaluateRelationship(dataset, rule)
          : this.evaluateComparison(dataset, rule);
    } catch (error) {
      logger.warn({ rule: name, error: errorMessage(error) }, 'Consistency rule could not be evaluated');
      tally = failedTally(errorMessage(error));
    }
    return {
      ruleType: rule.kind,
      description: rule.description,
      ...tally,
      status: classifyScore(tally.consistencyScore, this.thresholds),
    };
  }

  evaluate(dataset: TabularDataset | null): ConsistencyResult {
    this.rules.seal();

    if (!dataset || isEmptyDataset(dataset)) {
      return { type: 'consistency', score: 0, status: 'failed', message: 'No data to evaluate', rules: {} };
    }

    if (this.rules.size === 0) {
      return {
        type: 'consistency',
        score: 1,
        status: 'passed',
        message: 'No consistency rules configured',
        rules: {},
      };
    }

    const rules: Record<string, ConsistencyRuleResult> = {};
    for (const [name, rule] of this.rules.entries()) {
      rules[name] = this.evaluateRule(dataset, name, rule);
    }

    const results = Object.values(rules);
    const score = results.reduce((sum, r) => sum + r.consistencyScore, 0) / results.length;
    const failedRows = results.reduce((sum, r) => sum + r.inconsistentRows, 0);
    const checkedRows = results.reduce((sum, r) => sum + r.consistentRows + r.inconsistentRows, 0);

    logger.debug({ metric: this.name, score, failedRows, checkedRows }, 'Consistency evaluated');

    return {
      type: 'consistency',
      score,
      status: classifyScore(score, this.thresholds),
      message:
        checkedRows > 0
          ? `${failedRows} of ${checkedRows} consistency checks failed (${formatPercent(score)} consistency)`
          : 'No applicable data for consistency rules',
      rules,
    };
  }

  clear(): void {
    this.rules.clear();
    logger.debug({ metric: this.name }, 'Cleared consistency rules');
  }
}
