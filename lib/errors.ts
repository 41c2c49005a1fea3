/**
 * Error taxonomy for the utility API and the statistics import.
 *
 * Provider errors carry a `category` so callers can decide between aborting a
 * cycle (auth) and skipping one account or feed (everything else).
 * ParseFailure and ValidationFailure describe a single bad record.
 */

export type ProviderErrorCategory =
  | "auth"
  | "connectivity"
  | "retry-exhausted"
  | "generic";

export abstract class UtilityProviderError extends Error {
  abstract readonly category: ProviderErrorCategory;
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/** Credentials rejected; the whole cycle aborts and re-authentication is needed */
export class AuthenticationFailure extends UtilityProviderError {
  readonly category = "auth" as const;
}

export class ConnectivityFailure extends UtilityProviderError {
  readonly category = "connectivity" as const;
}

export class RetryExhausted extends UtilityProviderError {
  readonly category = "retry-exhausted" as const;
}

export class GenericProviderError extends UtilityProviderError {
  readonly category = "generic" as const;
}

/**
 * A record with a missing or malformed timestamp / field
 */
export class ParseFailure extends Error {
  constructor(
    message: string,
    readonly rawValue?: unknown,
  ) {
    super(message);
    this.name = "ParseFailure";
  }
}

/**
 * Input outside its valid range (e.g. month 13), or a response body that
 * does not have the expected shape
 */
export class ValidationFailure extends Error {
  constructor(
    message: string,
    readonly rawValue?: unknown,
  ) {
    super(message);
    this.name = "ValidationFailure";
  }
}

export function isAuthenticationFailure(
  error: unknown,
): error is AuthenticationFailure {
  return error instanceof AuthenticationFailure;
}

/**
 * Errors that skip one account for the rest of a cycle
 */
export function isRecoverableProviderError(
  error: unknown,
): error is UtilityProviderError {
  return error instanceof UtilityProviderError && error.category !== "auth";
}

/**
 * Errors that skip a single feed (usage, cost, AMI, interval) and keep its
 * previous data
 */
export function isRecoverableFeedError(error: unknown): boolean {
  return isRecoverableProviderError(error) || error instanceof ValidationFailure;
}

export function describeError(error: unknown): string {
  if (error instanceof UtilityProviderError) {
    return error.statusCode !== undefined
      ? `${error.name} (${error.statusCode}): ${error.message}`
      : `${error.name}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
