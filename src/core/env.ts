/**
 * Environment variable handling with validation
 */

import { isValid, parseISO } from 'date-fns';

export interface EnvConfig {
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  nodeEnv: 'development' | 'production' | 'test';
  qualityProfilePath: string | null;
  referenceDate: Date | null;
}

const LOG_LEVELS: EnvConfig['logLevel'][] = ['debug', 'info', 'warn', 'error', 'silent'];
const NODE_ENVS: EnvConfig['nodeEnv'][] = ['development', 'production', 'test'];

function getEnvVar(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

function pickOption<T extends string>(raw: string | undefined, options: T[], fallback: T): T {
  return options.find((option) => option === raw) ?? fallback;
}

export function loadEnvConfig(): EnvConfig {
  const logLevel = pickOption(getEnvVar('LOG_LEVEL'), LOG_LEVELS, 'info');
  const nodeEnv = pickOption(process.env.NODE_ENV, NODE_ENVS, 'development');

  const referenceRaw = getEnvVar('QUALITY_REFERENCE_DATE');
  let referenceDate: Date | null = null;
  if (referenceRaw) {
    const parsed = parseISO(referenceRaw);
    if (!isValid(parsed)) {
      throw new Error(`QUALITY_REFERENCE_DATE is not an ISO date: ${referenceRaw}`);
    }
    referenceDate = parsed;
  }

  return {
    logLevel,
    nodeEnv,
    qualityProfilePath: getEnvVar('QUALITY_PROFILE') ?? null,
    referenceDate,
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
