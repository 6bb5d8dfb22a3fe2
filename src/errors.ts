import { RejectionReason } from './types.js';

/**
 * Base class for every error docscout reports to a client.
 * `code` is stable and machine-readable; `status` is the HTTP status used
 * when the error is rejected before a stream opens.
 */
export class DocscoutError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly status: number = 500
  ) {
    super(message);
    this.name = 'DocscoutError';
  }

  toJSON(): { code: string; message: string } {
    return { code: this.code, message: this.message };
  }
}

// ============================================
// Turn-local errors (reported back to the agent)
// ============================================

export class ValidationRejectedError extends DocscoutError {
  constructor(
    public readonly reason: RejectionReason,
    detail: string
  ) {
    super(`Command rejected (${reason}): ${detail}`, 'validation_rejected', 400);
    this.name = 'ValidationRejectedError';
  }
}

export class ExecutionTimeoutError extends DocscoutError {
  constructor(public readonly timeoutMs: number) {
    super(`Command timed out after ${timeoutMs / 1000} seconds`, 'execution_timeout', 504);
    this.name = 'ExecutionTimeoutError';
  }
}

export class ExecutionFailedError extends DocscoutError {
  constructor(
    public readonly exitCode: number | null,
    stderr: string
  ) {
    const summary = stderr.trim() ? `: ${stderr.trim()}` : '';
    super(`Command failed with exit code ${exitCode ?? 'unknown'}${summary}`, 'execution_failed', 500);
    this.name = 'ExecutionFailedError';
  }
}

// ============================================
// Turn-ending errors
// ============================================

export class AgentCollaboratorError extends DocscoutError {
  constructor(message: string, cause?: unknown) {
    super(message, 'agent_error', 502);
    this.name = 'AgentCollaboratorError';
    this.cause = cause;
  }
}

// ============================================
// Request errors (rejected before any stream opens)
// ============================================

export class SessionBusyError extends DocscoutError {
  constructor(sessionId: string) {
    super(`Session ${sessionId} is already processing a message`, 'session_busy', 409);
    this.name = 'SessionBusyError';
  }
}

export class SessionExpiredError extends DocscoutError {
  constructor(sessionId: string) {
    super(`Session ${sessionId} has expired`, 'session_expired', 410);
    this.name = 'SessionExpiredError';
  }
}

export class SessionNotFoundError extends DocscoutError {
  constructor(sessionId: string) {
    super(`Session ${sessionId} not found`, 'session_not_found', 404);
    this.name = 'SessionNotFoundError';
  }
}

export class MalformedRequestError extends DocscoutError {
  constructor(message: string) {
    super(message, 'malformed_request', 400);
    this.name = 'MalformedRequestError';
  }
}

/**
 * Render an unknown thrown value as a message.
 * Errors raised by Node core may come from another realm, so no instanceof.
 */
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Extract the errno code (ENOENT, ESRCH, ...) from a thrown value, if any
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
