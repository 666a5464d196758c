/**
 * Error types shared across the service.
 *
 * Each error carries the HTTP status the server answers with and the `detail`
 * string that goes into the response body.
 */

export class AppError extends Error {
  readonly status: number;
  readonly detail: string;

  constructor(status: number, detail: string, options?: { cause?: unknown }) {
    super(detail, options);
    this.name = new.target.name;
    this.status = status;
    this.detail = detail;
  }
}

/** Raised at startup when required environment variables are missing or invalid. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class DocumentDownloadError extends AppError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super(400, `Failed to download document: ${reason}`, options);
  }
}

export class DocumentProcessingError extends AppError {
  readonly reason: string;

  constructor(reason: string, options?: { cause?: unknown }) {
    super(400, 'Document could not be processed.', options);
    this.reason = reason;
  }
}

export class VectorStoreUnavailableError extends AppError {
  constructor(options?: { cause?: unknown }) {
    super(500, 'MongoDB connection failed', options);
  }
}

export class LLMError extends AppError {
  readonly upstreamStatus?: number;

  constructor(message: string, upstreamStatus?: number) {
    super(502, message);
    this.upstreamStatus = upstreamStatus;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
