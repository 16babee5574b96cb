// =============================================================================
// Calmpoint API — Error taxonomy
// The error-handler plugin turns any AppError into the standard envelope:
//   { success: false, error: { code, message, details? } }
// =============================================================================

export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.details = details;
  }
}

/** Malformed, missing or out-of-range payload field. Never retried. */
export class InputValidationError extends AppError {
  readonly statusCode = 400;
  readonly code = 'VALIDATION_ERROR';

  constructor(readonly field: string, message: string) {
    super(message, { field });
  }
}

/** A session id was supplied but is not (or no longer) tracked. */
export class SessionStateError extends AppError {
  readonly statusCode = 404;
  readonly code = 'SESSION_EXPIRED';

  constructor(readonly sessionId: string) {
    super('Chat session has expired or does not exist');
  }
}

/**
 * The generative-text collaborator failed or timed out. Chat turns recover
 * locally with a fallback reply; only session-less paths surface this.
 */
export class UpstreamGenerationError extends AppError {
  readonly statusCode = 502;
  readonly code = 'GENERATION_FAILED';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, undefined, options);
  }
}

/** A required write or read against the datastore failed. */
export class UpstreamStorageError extends AppError {
  readonly statusCode = 500;
  readonly code = 'STORAGE_ERROR';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, undefined, options);
  }
}

export class NotFoundError extends AppError {
  readonly statusCode = 404;
  readonly code = 'NOT_FOUND';
}
