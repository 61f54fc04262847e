/**
 * Ajv validation instance with schema validators
 * Profiles must validate before any metric is built from them
 */

import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import type { QualityProfile } from '@/core/config';
import { getQualityProfileSchema } from './schema_loader';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// Add format validators (date, email, uri, etc.)
addFormats(ajv);

// Lazy-loaded validator
let qualityProfileValidator: ValidateFunction<QualityProfile> | null = null;

export function getQualityProfileValidator(): ValidateFunction<QualityProfile> {
  if (!qualityProfileValidator) {
    qualityProfileValidator = ajv.compile<QualityProfile>(getQualityProfileSchema());
  }
  return qualityProfileValidator;
}

export interface ValidationResult<T> {
  valid: boolean;
  data: T | null;
  errors: string[] | null;
}

export function validateQualityProfile(data: unknown): ValidationResult<QualityProfile> {
  const validate = getQualityProfileValidator();

  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}
