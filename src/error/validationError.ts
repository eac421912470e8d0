import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

function issuePath(issue: StandardSchemaV1.Issue): string {
  return (issue.path ?? []).map((segment) => String(typeof segment === 'object' ? segment.key : segment)).join('.');
}

function describeIssue(issue: StandardSchemaV1.Issue): string {
  const path = issuePath(issue);
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Error raised when a secret response or the environment does not match its schema.
 *
 * The message lists each issue as `field: problem`, e.g.
 * `error validating data: version: Required; properties.enabled: Expected boolean`.
 */
export class ValidationError extends Error {
  /** ValidationError error-name */
  static override name = 'ValidationError';
  /** Schema validation issues */
  #issues: readonly StandardSchemaV1.Issue[];

  /** Creates a new instance of the ValidationError, with accompanying issues */
  constructor(message: string, issues: readonly StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    super(issues.length ? `${message}: ${issues.map(describeIssue).join('; ')}` : message, opts);
    this.#issues = issues;
  }

  /** Schema validation issues */
  get issues(): readonly StandardSchemaV1.Issue[] {
    return this.#issues;
  }

  /** Dotted paths of the offending fields, e.g. `properties.enabled`; empty for root issues. */
  get fields(): string[] {
    return this.#issues.map(issuePath);
  }
}

/**
 * Type guard for {@link ValidationError}.
 */
export function isValidationError(error: unknown): error is ValidationError {
  return isErrorType(ValidationError, error);
}

/**
 * Extract a {@link ValidationError} from an unknown error value, following nested causes.
 */
export function getValidationError(error: unknown): null | ValidationError {
  return unwrapErrorType(ValidationError, error);
}
