/**
 * POLICY POOL - Errors
 *
 * Every failure the pool raises carries a stable `code` so callers can branch
 * without string matching.
 */

export type PolicyPoolErrorCode = 'CONFIGURATION' | 'NAMING_CONFLICT' | 'NOT_FOUND' | 'STORAGE';

export class PolicyPoolError extends Error {
  readonly code: PolicyPoolErrorCode;

  constructor(code: PolicyPoolErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PolicyPoolError';
    this.code = code;
  }
}

/** Invalid pool construction, configuration or batch shape. */
export class ConfigurationError extends PolicyPoolError {
  constructor(message: string) {
    super('CONFIGURATION', message);
    this.name = 'ConfigurationError';
  }
}

/** A policy with this name already exists and overwrite was not allowed. */
export class NamingConflictError extends PolicyPoolError {
  readonly policyName: string;

  constructor(policyName: string) {
    super('NAMING_CONFLICT', `A policy with the name '${policyName}' already exists.`);
    this.name = 'NamingConflictError';
    this.policyName = policyName;
  }
}

export class PolicyNotFoundError extends PolicyPoolError {
  readonly policyName: string;

  constructor(policyName: string) {
    super('NOT_FOUND', `Policy with name '${policyName}' does not exist.`);
    this.name = 'PolicyNotFoundError';
    this.policyName = policyName;
  }
}

/** Wraps a failure of the underlying database or snapshot files. */
export class StorageError extends PolicyPoolError {
  constructor(message: string, cause?: unknown) {
    super('STORAGE', message, { cause });
    this.name = 'StorageError';
  }
}
