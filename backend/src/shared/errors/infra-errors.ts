/**
 * backend/src/shared/errors/infra-errors.ts
 *
 * WHY:
 * - Infrastructure failures (config, credential store, cache) are not AppErrors:
 *   they carry no HTTP semantics of their own.
 * - The error handler maps them to responses; services decide per call site
 *   whether to fail open or fail closed.
 *
 * RULES:
 * - No module imports here.
 * - Always keep the original failure as `cause` for logs.
 */

export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class StoreUnavailableError extends Error {
  readonly operation: string;

  constructor(operation: string, options?: { cause?: unknown }) {
    super(`Credential store unavailable (${operation})`, options);
    this.name = 'StoreUnavailableError';
    this.operation = operation;
  }
}

export class CacheUnavailableError extends Error {
  readonly operation: string;

  constructor(operation: string, options?: { cause?: unknown }) {
    super(`Cache unavailable (${operation})`, options);
    this.name = 'CacheUnavailableError';
    this.operation = operation;
  }
}
