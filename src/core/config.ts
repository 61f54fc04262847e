/**
 * Quality profile loaded from JSON and validated against its schema
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { validateQualityProfile } from '@/validation/ajv_instance';
import { getEnvConfig } from './env';
import { ConfigurationError, ProfileValidationError, errorMessage } from './errors';

export interface MetricSectionConfig {
  enabled?: boolean;
  warning_threshold?: number;
  failure_threshold?: number;
}

export interface RangeCheckConfig {
  column: string;
  min?: number;
  max?: number;
}

export interface PatternCheckConfig {
  column: string;
  pattern: string;
}

export interface CategoricalCheckConfig {
  column: string;
  allowed_values: (string | number | boolean)[];
}

export interface RelationshipCheckConfig {
  name: string;
  condition: string;
  implies: string;
}

export interface ComparisonCheckConfig {
  name: string;
  left_column: string;
  operator: '<' | '<=' | '==' | '!=' | '>=' | '>';
  right_column: string;
}

export interface TimelinessCheckConfig {
  column: string;
  max_age_days: number;
  warning_age_days?: number;
}

export interface QualityProfile {
  version: '1';
  name: string;
  description?: string;
  metrics: {
    completeness?: MetricSectionConfig;
    accuracy?: MetricSectionConfig & {
      range_checks?: RangeCheckConfig[];
      pattern_checks?: PatternCheckConfig[];
      categorical_checks?: CategoricalCheckConfig[];
    };
    consistency?: MetricSectionConfig & {
      relationship_checks?: RelationshipCheckConfig[];
      comparison_checks?: ComparisonCheckConfig[];
    };
    timeliness?: MetricSectionConfig & {
      /** ISO date (yyyy-MM-dd) ages are measured against. */
      reference_date?: string;
      age_checks?: TimelinessCheckConfig[];
      freshness_checks?: TimelinessCheckConfig[];
    };
  };
}

const DEFAULT_PROFILE_PATH = join('config', 'quality_profile.json');

let cachedProfile: QualityProfile | null = null;

function getProjectRoot(): string {
  return process.cwd();
}

/** Explicit path, then QUALITY_PROFILE, then config/quality_profile.json. */
export function resolveProfilePath(path?: string): string {
  const chosen = path ?? getEnvConfig().qualityProfilePath ?? DEFAULT_PROFILE_PATH;
  return isAbsolute(chosen) ? chosen : join(getProjectRoot(), chosen);
}

export function loadQualityProfile(path?: string): QualityProfile {
  const profilePath = resolveProfilePath(path);
  if (!existsSync(profilePath)) {
    throw new ConfigurationError(`Quality profile not found: ${profilePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(profilePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Quality profile ${profilePath} is not valid JSON: ${errorMessage(error)}`);
  }

  const result = validateQualityProfile(parsed);
  if (!result.valid || !result.data) {
    throw new ProfileValidationError(profilePath, result.errors ?? []);
  }
  return result.data;
}

export function getQualityProfile(): QualityProfile {
  if (!cachedProfile) {
    cachedProfile = loadQualityProfile();
  }
  return cachedProfile;
}

export function resetQualityProfile(): void {
  cachedProfile = null;
}
