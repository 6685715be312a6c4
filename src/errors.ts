/**
 * Error taxonomy. `statusCode` is read by the Fastify error handler;
 * errors without one never reach a client directly.
 */

// Malformed or disallowed input, rejected before any job exists
export class ValidationError extends Error {
  readonly statusCode = 400;

  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

// A collaborator (downloader, recognition backend, model service) returned nothing or refused
export class CollaboratorUnavailable extends Error {
  constructor(
    readonly collaborator: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "CollaboratorUnavailable";
  }
}

// The rule-based summarizer itself failed; there is nothing left to fall back to
export class ProcessingFault extends Error {
  readonly statusCode = 500;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProcessingFault";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
