import type { MetricSectionConfig, QualityProfile } from '@/core/config';
import { getEnvConfig } from '@/core/env';
import { parseDate } from '@/core/time';
import { AccuracyMetric } from '@/metrics/accuracy';
import { CompletenessMetric } from '@/metrics/completeness';
import { ConsistencyMetric } from '@/metrics/consistency';
import { TimelinessMetric } from '@/metrics/timeliness';
import type { Metric, MetricOptions } from '@/metrics/types';
import { Analyzer } from './analyzer';

export interface ProfileBuildOptions {
  /** Overrides QUALITY_REFERENCE_DATE and the profile's own reference date. */
  referenceDate?: Date;
}

function isEnabled(section: MetricSectionConfig | undefined): boolean {
  return section?.enabled !== false;
}

function thresholdOptions(section: MetricSectionConfig | undefined): MetricOptions {
  return {
    warningThreshold: section?.warning_threshold,
    failureThreshold: section?.failure_threshold,
  };
}

/**
 * Builds the metrics a profile describes, in the order completeness,
 * accuracy, consistency, timeliness. A metric is left out only when its
 * section sets `enabled: false`; rules are registered in profile order.
 */
export function buildMetricsFromProfile(
  profile: QualityProfile,
  options: ProfileBuildOptions = {}
): Metric[] {
  const { completeness, accuracy, consistency, timeliness } = profile.metrics;
  const metrics: Metric[] = [];

  if (isEnabled(completeness)) {
    metrics.push(new CompletenessMetric(thresholdOptions(completeness)));
  }

  if (isEnabled(accuracy)) {
    const metric = new AccuracyMetric(thresholdOptions(accuracy));
    for (const check of accuracy?.range_checks ?? []) {
      metric.addRangeCheck(check);
    }
    for (const check of accuracy?.pattern_checks ?? []) {
      metric.addPatternCheck(check);
    }
    for (const check of accuracy?.categorical_checks ?? []) {
      metric.addCategoricalCheck({ column: check.column, allowedValues: check.allowed_values });
    }
    metrics.push(metric);
  }

  if (isEnabled(consistency)) {
    const metric = new ConsistencyMetric(thresholdOptions(consistency));
    for (const check of consistency?.relationship_checks ?? []) {
      metric.addRelationshipCheck(check.name, check.condition, check.implies);
    }
    for (const check of consistency?.comparison_checks ?? []) {
      metric.addComparisonCheck(check.name, check.left_column, check.operator, check.right_column);
    }
    metrics.push(metric);
  }

  if (isEnabled(timeliness)) {
    const profileDate = timeliness?.reference_date ? parseDate(timeliness.reference_date) : undefined;
    const metric = new TimelinessMetric({
      ...thresholdOptions(timeliness),
      referenceDate: options.referenceDate ?? getEnvConfig().referenceDate ?? profileDate,
    });
    for (const check of timeliness?.age_checks ?? []) {
      metric.addAgeCheck({
        column: check.column,
        maxAgeDays: check.max_age_days,
        warningAgeDays: check.warning_age_days,
      });
    }
    for (const check of timeliness?.freshness_checks ?? []) {
      metric.addFreshnessCheck({
        column: check.column,
        maxAgeDays: check.max_age_days,
        warningAgeDays: check.warning_age_days,
      });
    }
    metrics.push(metric);
  }

  return metrics;
}

/** Analyzer running exactly the profile's metrics, without the built-in defaults. */
export function createAnalyzerFromProfile(
  profile: QualityProfile,
  options: ProfileBuildOptions = {}
): Analyzer {
  const analyzer = new Analyzer({ withoutDefaults: true });
  for (const metric of buildMetricsFromProfile(profile, options)) {
    analyzer.addMetric(metric);
  }
  return analyzer;
}
