import type { FileAuditRecord, FileObservation, StatusCounts } from "../types.js";

export interface ListRecordsOptions {
  limit: number;
  status?: FileAuditRecord["status"];
}

/**
 * Single source of truth for file status. Each writer touches only the fields
 * it owns: scanners upsert observations, the archiver records archive
 * outcomes, the restore orchestrator records restore requests.
 */
export interface AuditRepository {
  init(): Promise<void>;
  /** Insert or refresh by path; always leaves the record Active with no archive reference. */
  upsertObservation(observation: FileObservation): Promise<FileAuditRecord>;
  findById(id: number): Promise<FileAuditRecord | undefined>;
  findByPath(path: string): Promise<FileAuditRecord | undefined>;
  listRecent(options: ListRecordsOptions): Promise<FileAuditRecord[]>;
  countByStatus(): Promise<StatusCounts>;
  /** Records the fingerprint of the bytes that were actually archived. */
  markArchived(id: number, archiveRef: string, fingerprint: string): Promise<FileAuditRecord | undefined>;
  markArchiveFailed(id: number, reason: string): Promise<FileAuditRecord | undefined>;
  /** Only applies to records that hold an archive reference; returns undefined otherwise. */
  markRestoring(id: number): Promise<FileAuditRecord | undefined>;
}
