import type { FileAuditRecord, FileSource, FileStatus } from "../types.js";

export class FileAuditRecordDto {
  id!: number;
  source!: FileSource;
  path!: string;
  fingerprint!: string;
  lastModified!: string;
  lastAccessed!: string;
  owner!: string;
  status!: FileStatus;
  archiveRef?: string;
  lastError?: string;
  createdAt!: string;
  updatedAt!: string;
}

export function toFileAuditRecordDto(record: FileAuditRecord): FileAuditRecordDto {
  return {
    id: record.id,
    source: record.source,
    path: record.path,
    fingerprint: record.fingerprint,
    lastModified: record.lastModified.toISOString(),
    lastAccessed: record.lastAccessed.toISOString(),
    owner: record.owner,
    status: record.status,
    archiveRef: record.archiveRef,
    lastError: record.lastError,
    createdAt: record.createdAt.toISOString(),
    updatedAt: record.updatedAt.toISOString(),
  };
}
