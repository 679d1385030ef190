import type { FileStatus } from "./types.js";

export type LifecycleErrorCode =
  | "PathEscape"
  | "NotReadable"
  | "RecordNotFound"
  | "FingerprintMismatch"
  | "NotArchived"
  | "InvalidState"
  | "RestoreInProgress"
  | "Collaborator"
  | "TransferTimeout";

export abstract class LifecycleError extends Error {
  abstract readonly code: LifecycleErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class PathEscapeError extends LifecycleError {
  readonly code = "PathEscape";

  constructor(readonly candidate: string, readonly root: string) {
    super(`Path ${candidate} resolves outside the allowed root ${root}`);
  }
}

export class NotReadableError extends LifecycleError {
  readonly code = "NotReadable";

  constructor(readonly path: string, reason: string, options?: { cause?: unknown }) {
    super(`File ${path} is not readable: ${reason}`, options);
  }
}

export class RecordNotFoundError extends LifecycleError {
  readonly code = "RecordNotFound";
}

export class FingerprintMismatchError extends LifecycleError {
  readonly code = "FingerprintMismatch";

  constructor(readonly expected: string, readonly actual: string, context: string) {
    super(`Fingerprint mismatch for ${context}: expected ${expected}, got ${actual}`);
  }
}

export class NotArchivedError extends LifecycleError {
  readonly code = "NotArchived";

  constructor(readonly recordId: number, readonly status: FileStatus) {
    super(`File ${recordId} is not archived (status ${status})`);
  }
}

export class InvalidStateError extends LifecycleError {
  readonly code = "InvalidState";

  constructor(readonly recordId: number, readonly status: FileStatus, guidance: string) {
    super(guidance);
  }
}

export class RestoreInProgressError extends LifecycleError {
  readonly code = "RestoreInProgress";

  constructor(readonly recordId: number) {
    super("File is being restored from cold storage. Try again in 12-48 hours.");
  }
}

export type CollaboratorErrorKind =
  | "unauthorized"
  | "forbidden"
  | "not-found"
  | "rate-limited"
  | "timeout"
  | "unavailable";

export class CollaboratorError extends LifecycleError {
  readonly code = "Collaborator";

  constructor(
    readonly collaborator: "cold-storage" | "remote-library",
    readonly kind: CollaboratorErrorKind,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class TransferTimeoutError extends LifecycleError {
  readonly code = "TransferTimeout";

  constructor(readonly timeoutMs: number) {
    super(`Transfer stalled for more than ${timeoutMs} ms`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Node's fs errors carry a `code`; anything else is reported as undefined. */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
