import { Injectable } from "@nestjs/common";

import { emptyStatusCounts } from "../types.js";
import type { FileAuditRecord, FileObservation, StatusCounts } from "../types.js";
import type { AuditRepository, ListRecordsOptions } from "./audit.repository.js";

@Injectable()
export class InMemoryAuditRepository implements AuditRepository {
  private readonly records = new Map<number, FileAuditRecord>();
  private readonly idsByPath = new Map<string, number>();
  private nextId = 1;

  async init(): Promise<void> {}

  async upsertObservation(observation: FileObservation): Promise<FileAuditRecord> {
    const now = new Date();
    const existingId = this.idsByPath.get(observation.path);
    const existing = existingId === undefined ? undefined : this.records.get(existingId);
    const record: FileAuditRecord = {
      id: existing?.id ?? this.nextId++,
      ...observation,
      lastModified: new Date(observation.lastModified),
      lastAccessed: new Date(observation.lastAccessed),
      status: "Active",
      archiveRef: undefined,
      lastError: undefined,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };
    this.records.set(record.id, record);
    this.idsByPath.set(record.path, record.id);
    return clone(record);
  }

  async findById(id: number): Promise<FileAuditRecord | undefined> {
    const record = this.records.get(id);
    return record ? clone(record) : undefined;
  }

  async findByPath(path: string): Promise<FileAuditRecord | undefined> {
    const id = this.idsByPath.get(path);
    return id === undefined ? undefined : this.findById(id);
  }

  async listRecent(options: ListRecordsOptions): Promise<FileAuditRecord[]> {
    return Array.from(this.records.values())
      .filter((record) => !options.status || record.status === options.status)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
      .slice(0, options.limit)
      .map(clone);
  }

  async countByStatus(): Promise<StatusCounts> {
    const counts = emptyStatusCounts();
    for (const record of this.records.values()) {
      counts[record.status] += 1;
    }
    return counts;
  }

  async markArchived(id: number, archiveRef: string, fingerprint: string): Promise<FileAuditRecord | undefined> {
    return this.update(id, () => true, { status: "Archived", archiveRef, fingerprint, lastError: undefined });
  }

  async markArchiveFailed(id: number, reason: string): Promise<FileAuditRecord | undefined> {
    return this.update(id, () => true, { status: "ArchiveFailed", archiveRef: undefined, lastError: reason });
  }

  async markRestoring(id: number): Promise<FileAuditRecord | undefined> {
    return this.update(
      id,
      (record) => Boolean(record.archiveRef) && (record.status === "Archived" || record.status === "Restoring"),
      { status: "Restoring" },
    );
  }

  private update(
    id: number,
    guard: (record: FileAuditRecord) => boolean,
    changes: Partial<Pick<FileAuditRecord, "status" | "archiveRef" | "fingerprint" | "lastError">>,
  ): FileAuditRecord | undefined {
    const record = this.records.get(id);
    if (!record || !guard(record)) {
      return undefined;
    }
    const updated: FileAuditRecord = { ...record, ...changes, updatedAt: new Date() };
    this.records.set(id, updated);
    return clone(updated);
  }
}

function clone(record: FileAuditRecord): FileAuditRecord {
  return {
    ...record,
    lastModified: new Date(record.lastModified),
    lastAccessed: new Date(record.lastAccessed),
    createdAt: new Date(record.createdAt),
    updatedAt: new Date(record.updatedAt),
  };
}
