import { ConfigurationError } from '@/core/errors';
import type { MetricStatus, MetricThresholds } from './types';

export const DEFAULT_COMPLETENESS_THRESHOLDS: MetricThresholds = {
  warningThreshold: 0.8,
  failureThreshold: 0.6,
};

export const DEFAULT_RULE_THRESHOLDS: MetricThresholds = {
  warningThreshold: 0.9,
  failureThreshold: 0.7,
};

/** Cutoffs for the analyzer's overall status, stricter than the per-metric defaults. */
export const OVERALL_THRESHOLDS: MetricThresholds = {
  warningThreshold: 0.95,
  failureThreshold: 0.8,
};

export function resolveThresholds(
  defaults: MetricThresholds,
  warningThreshold: number = defaults.warningThreshold,
  failureThreshold: number = defaults.failureThreshold
): MetricThresholds {
  for (const [label, value] of [
    ['warningThreshold', warningThreshold],
    ['failureThreshold', failureThreshold],
  ] as const) {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new ConfigurationError(`${label} must be between 0 and 1, got ${value}`);
    }
  }
  if (warningThreshold <= failureThreshold) {
    throw new ConfigurationError(
      `warningThreshold (${warningThreshold}) must be greater than failureThreshold (${failureThreshold})`
    );
  }
  return { warningThreshold, failureThreshold };
}

export function classifyScore(score: number, thresholds: MetricThresholds): MetricStatus {
  if (score >= thresholds.warningThreshold) return 'passed';
  if (score >= thresholds.failureThreshold) return 'warning';
  return 'failed';
}

export function ratio(numerator: number, denominator: number, whenEmpty: number): number {
  return denominator > 0 ? numerator / denominator : whenEmpty;
}

export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}
