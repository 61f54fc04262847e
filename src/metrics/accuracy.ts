import { ConfigurationError } from '@/core/errors';
import { getColumn, isEmptyDataset, isMissing } from '@/data/dataset';
import type { CellValue, DatasetColumn, TabularDataset } from '@/data/types';
import { createChildLogger } from '@/utils/logger';
import { RuleRegistry } from './rule_registry';
import {
  DEFAULT_RULE_THRESHOLDS,
  classifyScore,
  formatPercent,
  ratio,
  resolveThresholds,
} from './thresholds';
import type {
  AccuracyCheckOutcome,
  AccuracyColumnDetail,
  AccuracyResult,
  Metric,
  MetricOptions,
  MetricThresholds,
} from './types';

const logger = createChildLogger('metrics.accuracy');

const ALLOWED_PREVIEW_SIZE = 5;

export type CategoricalValue = string | number | boolean;

export interface RangeCheck {
  column: string;
  min?: number;
  max?: number;
}

export interface PatternCheck {
  column: string;
  pattern: string;
}

export interface CategoricalCheck {
  column: string;
  allowedValues: readonly CategoricalValue[];
}

type AccuracyRule =
  | { kind: 'range'; column: string; min: number | null; max: number | null }
  | { kind: 'pattern'; column: string; pattern: string; regex: RegExp }
  | { kind: 'categorical'; column: string; allowed: ReadonlySet<CategoricalValue> };

function presentValues(column: DatasetColumn): Exclude<CellValue, null>[] {
  return column.values.filter((v): v is Exclude<CellValue, null> => !isMissing(v));
}

function stringForm(value: Exclude<CellValue, null>): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

export function previewAllowedValues(allowed: ReadonlySet<CategoricalValue>): string {
  const values = Array.from(allowed);
  const shown = values.slice(0, ALLOWED_PREVIEW_SIZE).map(String);
  if (values.length > ALLOWED_PREVIEW_SIZE) shown.push('...');
  return `[${shown.join(', ')}]`;
}

function describeBounds(min: number | null, max: number | null): string {
  const parts: string[] = [];
  if (min !== null) parts.push(`min: ${min}`);
  if (max !== null) parts.push(`max: ${max}`);
  return parts.join(', ');
}

/**
 * Validates cell values against range, pattern and allowed-value checks.
 *
 * Pattern checks match the whole string form of a value, so `abc@d.com!`
 * does not satisfy an email pattern that `abc@d.com` does.
 */
export class AccuracyMetric implements Metric {
  readonly name: string;
  private readonly thresholds: MetricThresholds;
  private readonly rules: RuleRegistry<AccuracyRule>;

  constructor(options: MetricOptions = {}) {
    this.name = options.name ?? 'accuracy';
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

  addRangeCheck({ column, min, max }: RangeCheck): void {
    if (!column) throw new ConfigurationError('Range check requires a column');
    if (min === undefined && max === undefined) {
      throw new ConfigurationError('At least one of min or max must be specified');
    }
    if (min !== undefined && max !== undefined && min > max) {
      throw new ConfigurationError(`Range check on '${column}' has min ${min} greater than max ${max}`);
    }
    this.rules.add(`range:${column}`, {
      kind: 'range',
      column,
      min: min ?? null,
      max: max ?? null,
    });
    logger.debug({ column, min, max }, 'Added range check');
  }

  addPatternCheck({ column, pattern }: PatternCheck): void {
    if (!column) throw new ConfigurationError('Pattern check requires a column');
    if (!pattern) throw new ConfigurationError(`Pattern check on '${column}' requires a pattern`);
    let regex: RegExp;
    try {
      regex = new RegExp(`^(?:${pattern})$`);
    } catch (error) {
      throw new ConfigurationError(
        `Invalid regular expression pattern for '${column}': ${error instanceof Error ? error.message : String(error)}`
      );
    }
    this.rules.add(`pattern:${column}`, { kind: 'pattern', column, pattern, regex });
    logger.debug({ column, pattern }, 'Added pattern check');
  }

  addCategoricalCheck({ column, allowedValues }: CategoricalCheck): void {
    if (!column) throw new ConfigurationError('Categorical check requires a column');
    if (allowedValues.length === 0) {
      throw new ConfigurationError(`Allowed values for '${column}' cannot be empty`);
    }
    this.rules.add(`categorical:${column}`, {
      kind: 'categorical',
      column,
      allowed: new Set(allowedValues),
    });
    logger.debug({ column, allowedCount: allowedValues.length }, 'Added categorical check');
  }

  get checkCount(): number {
    return this.rules.size;
  }

  private evaluateRule(dataset: TabularDataset, rule: AccuracyRule): AccuracyCheckOutcome {
    const column = getColumn(dataset, rule.column);
    if (!column) {
      return { check: rule.kind, valid: 0, invalid: 0, message: `Column '${rule.column}' not found in data` };
    }
    const values = presentValues(column);
    if (values.length === 0) {
      return { check: rule.kind, valid: 0, invalid: 0, message: `No non-null values in column '${rule.column}'` };
    }

    switch (rule.kind) {
      case 'range': {
        if (column.kind !== 'numeric') {
          return {
            check: 'range',
            valid: 0,
            invalid: values.length,
            message: `Column '${rule.column}' is not numeric (kind: ${column.kind})`,
          };
        }
        const invalid = values.filter(
          (v) =>
            typeof v !== 'number' ||
            (rule.min !== null && v < rule.min) ||
            (rule.max !== null && v > rule.max)
        ).length;
        return {
          check: 'range',
          valid: values.length - invalid,
          invalid,
          message: `Range check (${describeBounds(rule.min, rule.max)}): ${invalid} values outside range`,
        };
      }
      case 'pattern': {
        const valid = values.filter((v) => rule.regex.test(stringForm(v))).length;
        const invalid = values.length - valid;
        return {
          check: 'pattern',
          valid,
          invalid,
          message: `Pattern check (${rule.pattern}): ${invalid} values don't match pattern`,
        };
      }
      case 'categorical': {
        const valid = values.filter((v) => !(v instanceof Date) && rule.allowed.has(v)).length;
        const invalid = values.length - valid;
        return {
          check: 'categorical',
          valid,
          invalid,
          message: `Categorical check: ${invalid} values not in allowed set ${previewAllowedValues(rule.allowed)}`,
        };
      }
    }
  }

  evaluate(dataset: TabularDataset | null): AccuracyResult {
    this.rules.seal();

    if (!dataset || isEmptyDataset(dataset)) {
      return { type: 'accuracy', score: 0, status: 'failed', message: 'No data to evaluate', details: {} };
    }

    if (this.rules.size === 0) {
      return {
        type: 'accuracy',
        score: 1,
        status: 'passed',
        message: 'No accuracy checks configured',
        details: {},
      };
    }

    const outcomesByColumn = new Map<string, AccuracyCheckOutcome[]>();
    for (const rule of this.rules.values()) {
      const outcome = this.evaluateRule(dataset, rule);
      const existing = outcomesByColumn.get(rule.column);
      if (existing) {
        existing.push(outcome);
      } else {
        outcomesByColumn.set(rule.column, [outcome]);
      }
    }

    const details: Record<string, AccuracyColumnDetail> = {};
    let totalValid = 0;
    let totalInvalid = 0;

    for (const [column, checks] of outcomesByColumn) {
      const valid = checks.reduce((sum, c) => sum + c.valid, 0);
      const invalid = checks.reduce((sum, c) => sum + c.invalid, 0);
      const accuracy = ratio(valid, valid + invalid, 1);
      totalValid += valid;
      totalInvalid += invalid;
      details[column] = {
        valid,
        invalid,
        accuracy,
        status: classifyScore(accuracy, this.thresholds),
        message: checks.map((c) => c.message).join('; '),
        checks,
      };
    }

    const totalChecked = totalValid + totalInvalid;
    const score = ratio(totalValid, totalChecked, 1);

    logger.debug({ metric: this.name, score, totalValid, totalInvalid }, 'Accuracy evaluated');

    return {
      type: 'accuracy',
      score,
      status: classifyScore(score, this.thresholds),
      message:
        totalChecked === 0
          ? 'No values were available for the configured checks'
          : `${totalInvalid} of ${totalChecked} checks failed (${formatPercent(score)} accuracy)`,
      details,
    };
  }

  clear(): void {
    this.rules.clear();
    logger.debug({ metric: this.name }, 'Cleared accuracy checks');
  }
}
