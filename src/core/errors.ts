/**
 * Error taxonomy for the quality engine.
 *
 * Configuration and precondition errors surface to the caller. Only
 * MetricEvaluationError is recovered locally: the analyzer and graders turn it
 * (and anything else a metric throws) into a degraded metric result.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class NotConnectedError extends Error {
  constructor(public grader: string) {
    super(`Grader '${grader}' is not connected to a data source. Call connect() first.`);
    this.name = 'NotConnectedError';
  }
}

export class NoActiveUnitError extends Error {
  constructor(public grader: string) {
    super(`Grader '${grader}' has no active unit. Call setActiveUnit() first.`);
    this.name = 'NoActiveUnitError';
  }
}

export class NoMetricsConfiguredError extends Error {
  constructor(message: string = 'No metrics configured') {
    super(message);
    this.name = 'NoMetricsConfiguredError';
  }
}

export class UnknownUnitError extends Error {
  constructor(
    public unit: string,
    public available: string[]
  ) {
    super(`Unit '${unit}' does not exist. Available: ${available.join(', ') || '(none)'}`);
    this.name = 'UnknownUnitError';
  }
}

export class SourceConnectionError extends Error {
  constructor(
    message: string,
    public sourceType: string,
    public source: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'SourceConnectionError';
  }
}

export class MetricEvaluationError extends Error {
  constructor(
    message: string,
    public metric?: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'MetricEvaluationError';
  }
}

export class ProfileValidationError extends Error {
  constructor(
    public profilePath: string,
    public errors: string[]
  ) {
    super(`Invalid quality profile ${profilePath}: ${errors.join('; ')}`);
    this.name = 'ProfileValidationError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
