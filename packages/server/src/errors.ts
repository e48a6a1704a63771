/**
 * Application error types. Each carries a stable `code` for logs.
 */

export abstract class AppError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.code = code;
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Invalid or incomplete runtime configuration. */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
  }
}

/** Operator-supplied hosting configuration does not match the descriptor schema. */
export class HostingConfigError extends AppError {
  constructor(message: string) {
    super(message, 'HOSTING_CONFIG_ERROR');
  }
}

/** A `sequentialthinking` call carried arguments that break the thought rules. */
export class ThoughtValidationError extends AppError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.join('; '), 'THOUGHT_VALIDATION_ERROR');
    this.issues = issues;
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
