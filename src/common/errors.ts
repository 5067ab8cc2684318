export type ValidationIssue = {
  path: string;
  message: string;
};

export class AppError extends Error {
  public readonly status: number;

  constructor(message: string, status = 500) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

/**
 * Raised at startup when the environment is missing a required value.
 * The process must not serve requests after this.
 */
export class ConfigError extends AppError {}

/**
 * The model reply did not contain parseable JSON.
 */
export class ParseError extends AppError {
  public readonly snippet: string;

  constructor(message: string, snippet: string) {
    super(message);
    this.snippet = snippet;
  }
}

/**
 * Parsed JSON did not match the expected response shape.
 * All mismatches are collected into `issues`.
 */
export class ValidationError extends AppError {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[]) {
    super(message);
    this.issues = issues;
  }
}

/**
 * The generative model call itself failed (network, quota, auth, blocked, timeout).
 */
export class UpstreamError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
