/**
 * Grades one workbook sheet or database table against a quality profile.
 */

import type { QualityProfile } from '@/core/config';
import { loadQualityProfile } from '@/core/config';
import { ConfigurationError } from '@/core/errors';
import { profileDataset } from '@/data/profiler';
import type { DatasetProfile } from '@/data/profiler';
import { createGrader, graderTypeForSource } from '@/graders/registry';
import type { GradeResult } from '@/graders/types';
import { meanScore } from '@/metrics/runner';
import { OVERALL_THRESHOLDS, classifyScore } from '@/metrics/thresholds';
import type { MetricStatus } from '@/metrics/types';
import { createChildLogger } from '@/utils/logger';
import { buildMetricsFromProfile } from './profile_builder';
import { buildRecommendations } from './recommendations';
import type { Recommendation } from './recommendations';

const logger = createChildLogger('analysis.audit');

export interface QualityAuditOptions {
  /** Path to an .xlsx workbook, a SQLite file or a `sqlite:` URL. */
  source: string;
  /** Sheet or table to grade. Defaults to the first sheet, or the only table. */
  unit?: string;
  /** Profile to apply; loaded from `profilePath` (or the default location) when omitted. */
  profile?: QualityProfile;
  profilePath?: string;
  referenceDate?: Date;
  /** Adds descriptive statistics of the graded unit to the report. */
  includeDataProfile?: boolean;
}

export interface QualityAuditReport extends GradeResult {
  profile: string;
  overallScore: number;
  overallStatus: MetricStatus;
  recommendations: Recommendation[];
  dataProfile?: DatasetProfile;
}

export async function runQualityAudit(options: QualityAuditOptions): Promise<QualityAuditReport> {
  const profile = options.profile ?? loadQualityProfile(options.profilePath);
  const type = graderTypeForSource(options.source);
  const grader = createGrader(type, `${profile.name}_${type}`);

  for (const metric of buildMetricsFromProfile(profile, { referenceDate: options.referenceDate })) {
    grader.addMetric(metric.name, metric);
  }

  await grader.connect(options.source);
  try {
    if (options.unit) {
      grader.setActiveUnit(options.unit);
    } else if (!grader.activeUnit) {
      const units = grader.getAvailableUnits();
      if (units.length !== 1) {
        throw new ConfigurationError(
          `Choose a unit to grade; available: ${units.join(', ') || '(none)'}`
        );
      }
      grader.setActiveUnit(units[0]);
    }

    const { result: graded, dataset } = grader.gradeWithData();
    const overallScore = meanScore(graded.metrics);
    const report: QualityAuditReport = {
      profile: profile.name,
      overallScore,
      overallStatus: classifyScore(overallScore, OVERALL_THRESHOLDS),
      ...graded,
      recommendations: buildRecommendations(graded.metrics, dataset),
    };
    if (options.includeDataProfile) {
      report.dataProfile = profileDataset(dataset);
    }

    logger.info(
      { profile: profile.name, unit: grader.activeUnit, overallScore, overallStatus: report.overallStatus },
      'Quality audit completed'
    );
    return report;
  } finally {
    grader.close();
  }
}
