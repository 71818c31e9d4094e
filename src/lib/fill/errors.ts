/**
 * Fill engine error taxonomy.
 *
 * Every failure that reaches the API boundary is one of these. `recoverable`
 * means the caller may retry the same request unchanged; the persisted
 * session state is untouched whenever one of these is thrown mid-turn.
 */

export type FillErrorCode =
  | "PARSE_ERROR"
  | "EXTRACTION_ERROR"
  | "MODEL_TIMEOUT"
  | "MODEL_UNAVAILABLE"
  | "SESSION_NOT_FOUND"
  | "DOCUMENT_NOT_FOUND"
  | "RENDER_ERROR"
  | "STORE_ERROR";

export class FillEngineError extends Error {
  readonly code: FillErrorCode;
  readonly recoverable: boolean;

  constructor(code: FillErrorCode, message: string, opts?: { recoverable?: boolean; cause?: unknown }) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.code = code;
    this.recoverable = opts?.recoverable ?? false;
  }
}

/** Template bytes are not a readable document. */
export class ParseError extends FillEngineError {
  constructor(message: string, cause?: unknown) {
    super("PARSE_ERROR", message, { cause });
  }
}

/** Template parsed, but nothing fillable was found. */
export class ExtractionError extends FillEngineError {
  constructor(message: string) {
    super("EXTRACTION_ERROR", message);
  }
}

export class ModelTimeoutError extends FillEngineError {
  readonly timeoutMs: number;

  constructor(tag: string, timeoutMs: number) {
    super("MODEL_TIMEOUT", `${tag} timed out after ${timeoutMs}ms`, { recoverable: true });
    this.timeoutMs = timeoutMs;
  }
}

export class ModelUnavailableError extends FillEngineError {
  constructor(message: string, cause?: unknown) {
    super("MODEL_UNAVAILABLE", message, { recoverable: true, cause });
  }
}

export class SessionNotFoundError extends FillEngineError {
  constructor(sessionId: string) {
    super("SESSION_NOT_FOUND", `session not found: ${sessionId}`);
  }
}

export class DocumentNotFoundError extends FillEngineError {
  constructor(documentId: string) {
    super("DOCUMENT_NOT_FOUND", `document not found: ${documentId}`);
  }
}

export class RenderError extends FillEngineError {
  constructor(message: string, cause?: unknown) {
    super("RENDER_ERROR", message, { cause });
  }
}

export class StoreError extends FillEngineError {
  constructor(message: string, cause?: unknown) {
    super("STORE_ERROR", message, { recoverable: true, cause });
  }
}

export function isFillEngineError(err: unknown): err is FillEngineError {
  return err instanceof FillEngineError;
}

const HTTP_STATUS: Record<FillErrorCode, number> = {
  PARSE_ERROR: 422,
  EXTRACTION_ERROR: 422,
  MODEL_TIMEOUT: 504,
  MODEL_UNAVAILABLE: 503,
  SESSION_NOT_FOUND: 404,
  DOCUMENT_NOT_FOUND: 404,
  RENDER_ERROR: 422,
  STORE_ERROR: 503,
};

export function httpStatusForError(err: unknown): number {
  return isFillEngineError(err) ? HTTP_STATUS[err.code] : 500;
}
