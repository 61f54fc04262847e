import { ConfigurationError } from '@/core/errors';
import { ageInDays, formatDate, getReferenceDate, toDate } from '@/core/time';
import { getColumn, isEmptyDataset, isMissing } from '@/data/dataset';
import type { TabularDataset } from '@/data/types';
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
  Metric,
  MetricOptions,
  MetricThresholds,
  TimelinessCheckKind,
  TimelinessColumnDetail,
  TimelinessResult,
} from './types';

const logger = createChildLogger('metrics.timeliness');

export interface TimelinessCheck {
  column: string;
  maxAgeDays: number;
  /** Age after which a still-timely value counts as nearing the limit. Defaults to half of maxAgeDays. */
  warningAgeDays?: number;
}

export interface TimelinessOptions extends MetricOptions {
  /** Date ages are measured against; truncated to the start of its day. Defaults to today. */
  referenceDate?: Date;
}

interface TimelinessRule {
  kind: TimelinessCheckKind;
  column: string;
  maxAgeDays: number;
  warningAgeDays: number;
}

const CHECK_LABELS: Record<TimelinessCheckKind, string> = {
  age: 'Age check',
  freshness: 'Freshness check',
};

export class TimelinessMetric implements Metric {
  readonly name: string;
  readonly referenceDate: Date;
  private readonly thresholds: MetricThresholds;
  private readonly rules: RuleRegistry<TimelinessRule>;

  constructor(options: TimelinessOptions = {}) {
    this.name = options.name ?? 'timeliness';
    this.thresholds = resolveThresholds(
      DEFAULT_RULE_THRESHOLDS,
      options.warningThreshold,
      options.failureThreshold
    );
    this.referenceDate = getReferenceDate(options.referenceDate);
    this.rules = new RuleRegistry(this.name);
    logger.debug({ metric: this.name, referenceDate: formatDate(this.referenceDate) }, 'Initialized timeliness metric');
  }

  get warningThreshold(): number {
    return this.thresholds.warningThreshold;
  }

  get failureThreshold(): number {
    return this.thresholds.failureThreshold;
  }

  get checkCount(): number {
    return this.rules.size;
  }

  addAgeCheck(check: TimelinessCheck): void {
    this.addCheck('age', check);
  }

  /** Same arithmetic as an age check; reported separately for update timestamps. */
  addFreshnessCheck(check: TimelinessCheck): void {
    this.addCheck('freshness', check);
  }

  private addCheck(kind: TimelinessCheckKind, { column, maxAgeDays, warningAgeDays }: TimelinessCheck): void {
    if (!column) throw new ConfigurationError(`${CHECK_LABELS[kind]} requires a column`);
    if (!Number.isFinite(maxAgeDays) || maxAgeDays <= 0) {
      throw new ConfigurationError(`maxAgeDays must be a positive number, got ${maxAgeDays}`);
    }
    const warning = warningAgeDays ?? Math.floor(maxAgeDays / 2);
    if (!Number.isFinite(warning) || warning < 0 || warning > maxAgeDays) {
      throw new ConfigurationError(
        `warningAgeDays for '${column}' must be between 0 and ${maxAgeDays}, got ${warning}`
      );
    }
    this.rules.add(`${kind}:${column}`, { kind, column, maxAgeDays, warningAgeDays: warning });
    logger.debug({ kind, column, maxAgeDays, warningAgeDays: warning }, 'Added timeliness check');
  }

  private evaluateRule(dataset: TabularDataset, rule: TimelinessRule): TimelinessColumnDetail {
    const base = {
      checkType: rule.kind,
      maxAgeDays: rule.maxAgeDays,
      warningAgeDays: rule.warningAgeDays,
    };
    const column = getColumn(dataset, rule.column);
    if (!column) {
      return {
        ...base,
        timely: 0,
        untimely: 0,
        nearingLimit: 0,
        timelinessScore: 0,
        oldestAgeDays: null,
        status: 'failed',
        message: `Column '${rule.column}' not found in data`,
      };
    }

    const present = column.values.filter((v) => !isMissing(v));
    if (present.length === 0) {
      return {
        ...base,
        timely: 0,
        untimely: 0,
        nearingLimit: 0,
        timelinessScore: 1,
        oldestAgeDays: null,
        status: 'passed',
        message: `No non-null values in column '${rule.column}'`,
      };
    }

    const ages: number[] = [];
    let oldestAgeDays = Number.NEGATIVE_INFINITY;
    for (const value of present) {
      const date = toDate(value);
      if (!date) {
        return {
          ...base,
          timely: 0,
          untimely: present.length,
          nearingLimit: 0,
          timelinessScore: 0,
          oldestAgeDays: null,
          status: 'failed',
          message: `Could not convert '${rule.column}' to dates: '${String(value)}' is not a date`,
        };
      }
      const age = ageInDays(this.referenceDate, date);
      if (age > oldestAgeDays) oldestAgeDays = age;
      ages.push(age);
    }

    const timely = ages.filter((age) => age <= rule.maxAgeDays).length;
    const nearingLimit = ages.filter((age) => age > rule.warningAgeDays && age <= rule.maxAgeDays).length;
    const untimely = ages.length - timely;
    const timelinessScore = ratio(timely, ages.length, 1);

    return {
      ...base,
      timely,
      untimely,
      nearingLimit,
      timelinessScore,
      oldestAgeDays,
      status: classifyScore(timelinessScore, this.thresholds),
      message: `${CHECK_LABELS[rule.kind]}: ${untimely} of ${ages.length} values exceed max age of ${rule.maxAgeDays} days`,
    };
  }

  evaluate(dataset: TabularDataset | null): TimelinessResult {
    this.rules.seal();
    const referenceDate = formatDate(this.referenceDate);

    if (!dataset || isEmptyDataset(dataset)) {
      return {
        type: 'timeliness',
        score: 0,
        status: 'failed',
        message: 'No data to evaluate',
        referenceDate,
        details: {},
      };
    }

    if (this.rules.size === 0) {
      return {
        type: 'timeliness',
        score: 1,
        status: 'passed',
        message: 'No timeliness checks configured',
        referenceDate,
        details: {},
      };
    }

    // One entry per column; when both kinds target a column the lower score is kept.
    const details: Record<string, TimelinessColumnDetail> = {};
    for (const rule of this.rules.values()) {
      const detail = this.evaluateRule(dataset, rule);
      const existing = details[rule.column];
      if (!existing || detail.timelinessScore < existing.timelinessScore) {
        details[rule.column] = detail;
      }
    }

    const results = Object.values(details);
    const score = results.reduce((sum, d) => sum + d.timelinessScore, 0) / results.length;
    const untimely = results.reduce((sum, d) => sum + d.untimely, 0);
    const checked = results.reduce((sum, d) => sum + d.timely + d.untimely, 0);

    logger.debug({ metric: this.name, score, untimely, checked }, 'Timeliness evaluated');

    return {
      type: 'timeliness',
      score,
      status: classifyScore(score, this.thresholds),
      message:
        checked > 0
          ? `${untimely} of ${checked} timeliness checks failed (${formatPercent(score)} timely)`
          : 'No applicable data for timeliness checks',
      referenceDate,
      details,
    };
  }

  clear(): void {
    this.rules.clear();
    logger.debug({ metric: this.name }, 'Cleared timeliness checks');
  }
}
