import type { Readable } from "node:stream";

import type { RestoreTier } from "../config.js";

export interface ArchiveMetadata {
  originalPath: string;
  fingerprint: string;
  archivedAt: Date;
}

export interface UploadRequest {
  key: string;
  body: Readable;
  contentLength: number;
  metadata: ArchiveMetadata;
}

/**
 * Where a cold object stands with respect to retrieval:
 * - `not-required`: the storage class serves reads directly
 * - `cold`: needs a restore request first
 * - `in-progress`: a restore was requested and has not finished
 * - `available`: a rehydrated copy can be downloaded
 */
export type RehydrationState = "not-required" | "cold" | "in-progress" | "available";

export interface ColdObjectInfo {
  ref: string;
  size?: number;
  storageClass?: string;
  fingerprint?: string;
  originalPath?: string;
  rehydration: RehydrationState;
}

export interface RestoreOptions {
  days: number;
  tier: RestoreTier;
}

export type RestoreRequestOutcome = "initiated" | "already-in-progress";

export interface ColdStorageService {
  /** Stores the object and returns its archive reference. */
  upload(request: UploadRequest): Promise<string>;
  describe(ref: string): Promise<ColdObjectInfo>;
  requestRestore(ref: string, options: RestoreOptions): Promise<RestoreRequestOutcome>;
  /** Writes the object to `destination`; rejects with ColdObjectNotRestoredError while it is still cold. */
  downloadTo(ref: string, destination: string): Promise<void>;
}

export class ColdObjectNotRestoredError extends Error {
  constructor(readonly ref: string) {
    super(`Object ${ref} has not been restored from cold storage yet`);
    this.name = "ColdObjectNotRestoredError";
  }
}

const RESTORE_REQUIRED_CLASSES = new Set(["GLACIER", "DEEP_ARCHIVE"]);

export function requiresRestore(storageClass: string | undefined): boolean {
  return storageClass !== undefined && RESTORE_REQUIRED_CLASSES.has(storageClass);
}

export const ARCHIVED_BY = "file-lifecycle";

/** Object metadata must be ASCII, so the original path travels URI-encoded. */
export function toObjectMetadata(metadata: ArchiveMetadata): Record<string, string> {
  return {
    "original-path": encodeURIComponent(metadata.originalPath),
    fingerprint: metadata.fingerprint,
    "archived-at": metadata.archivedAt.toISOString(),
    "archived-by": ARCHIVED_BY,
  };
}

export function fromObjectMetadata(
  metadata: Record<string, string> | undefined,
): Pick<ColdObjectInfo, "fingerprint" | "originalPath"> {
  const originalPath = metadata?.["original-path"];
  return {
    fingerprint: metadata?.fingerprint,
    originalPath: originalPath === undefined ? undefined : safeDecode(originalPath),
  };
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

export function joinKey(prefix: string | undefined, key: string): string {
  const normalizedPrefix = prefix ? `${prefix.replace(/\/+$/, "")}/` : "";
  return `${normalizedPrefix}${key.replace(/^\/+/, "")}`;
}
