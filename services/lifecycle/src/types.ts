export const FILE_SOURCES = ["file-server", "remote-library"] as const;
export type FileSource = (typeof FILE_SOURCES)[number];

export const FILE_STATUSES = ["Active", "Archived", "Restoring", "ArchiveFailed"] as const;
export type FileStatus = (typeof FILE_STATUSES)[number];

/**
 * One row of the audit trail. Records are never deleted: a record outlives the
 * file it describes once that file has been moved to cold storage.
 *
 * `fingerprint` is an MD5 content hash for file-server records. Remote-library
 * records carry `md5(path + lastModified)` instead, which detects metadata
 * changes but says nothing about the bytes.
 */
export interface FileAuditRecord {
  id: number;
  source: FileSource;
  path: string;
  fingerprint: string;
  lastModified: Date;
  lastAccessed: Date;
  owner: string;
  status: FileStatus;
  archiveRef?: string;
  lastError?: string;
  createdAt: Date;
  updatedAt: Date;
}

/** What a scanner pass knows about a file before it reaches the audit store. */
export interface FileObservation {
  source: FileSource;
  path: string;
  fingerprint: string;
  lastModified: Date;
  lastAccessed: Date;
  owner: string;
}

export type StatusCounts = Record<FileStatus, number>;

export function emptyStatusCounts(): StatusCounts {
  return { Active: 0, Archived: 0, Restoring: 0, ArchiveFailed: 0 };
}

const KNOWN_STATUSES: ReadonlySet<string> = new Set(FILE_STATUSES);
const KNOWN_SOURCES: ReadonlySet<string> = new Set(FILE_SOURCES);

export function isFileStatus(value: string): value is FileStatus {
  return KNOWN_STATUSES.has(value);
}

export function isFileSource(value: string): value is FileSource {
  return KNOWN_SOURCES.has(value);
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${String(value)}`);
}
