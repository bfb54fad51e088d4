/** Base class for every error raised by the RAGFlow client. */
export class RagflowError extends Error {
  readonly code?: number;

  constructor(message: string, code?: number) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** 401 from the server, or no API key at all */
export class AuthenticationError extends RagflowError {}

/** Non-2xx status, non-zero envelope code, or a body that isn't JSON */
export class APIError extends RagflowError {}

/** Response payload didn't have the shape we expect */
export class ValidationError extends RagflowError {}

/** 404, or a lookup (dataset by name) that matched nothing usable */
export class ResourceNotFoundError extends RagflowError {}

/** Render anything that was thrown as a single line for the terminal. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}
