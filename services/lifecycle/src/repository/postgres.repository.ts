import { Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import { Pool } from "pg";

import { emptyStatusCounts, isFileSource, isFileStatus } from "../types.js";
import type { FileAuditRecord, FileObservation, StatusCounts } from "../types.js";
import type { AuditRepository, ListRecordsOptions } from "./audit.repository.js";

type FileAuditRow = {
  id: number;
  source: string;
  file_path: string;
  last_modified: Date;
  last_accessed: Date;
  owner: string | null;
  checksum: string;
  status: string;
  archive_url: string | null;
  last_error: string | null;
  created_at: Date;
  updated_at: Date;
};

const COLUMNS = `id, source, file_path, last_modified, last_accessed, owner, checksum,
  status, archive_url, last_error, created_at, updated_at`;

export const FILE_AUDIT_SCHEMA = `
  CREATE TABLE IF NOT EXISTS file_audit (
    id SERIAL PRIMARY KEY,
    source TEXT NOT NULL CHECK (source IN ('file-server', 'remote-library')),
    file_path TEXT NOT NULL UNIQUE,
    last_modified TIMESTAMPTZ NOT NULL,
    last_accessed TIMESTAMPTZ NOT NULL,
    owner TEXT,
    checksum TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'Active'
      CHECK (status IN ('Active', 'Archived', 'Restoring', 'ArchiveFailed')),
    archive_url TEXT,
    last_error TEXT,
    created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
    CHECK ((archive_url IS NOT NULL) = (status IN ('Archived', 'Restoring')))
  );

  CREATE INDEX IF NOT EXISTS idx_file_audit_status ON file_audit (status);
  CREATE INDEX IF NOT EXISTS idx_file_audit_last_accessed ON file_audit (last_accessed);
  CREATE INDEX IF NOT EXISTS idx_file_audit_source ON file_audit (source);

  CREATE OR REPLACE FUNCTION file_audit_touch_updated_at()
  RETURNS TRIGGER AS $$
  BEGIN
    NEW.updated_at = CURRENT_TIMESTAMP;
    RETURN NEW;
  END;
  $$ LANGUAGE plpgsql;

  DROP TRIGGER IF EXISTS trigger_file_audit_updated_at ON file_audit;
  CREATE TRIGGER trigger_file_audit_updated_at
    BEFORE UPDATE ON file_audit
    FOR EACH ROW
    EXECUTE FUNCTION file_audit_touch_updated_at();
`;

@Injectable()
export class PostgresAuditRepository implements AuditRepository, OnModuleDestroy {
  private readonly logger = new Logger(PostgresAuditRepository.name);
  private readonly pool: Pool;
  private initialized = false;

  constructor(databaseUrl: string) {
    this.pool = new Pool({ connectionString: databaseUrl });
  }

  async init(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await this.pool.query(FILE_AUDIT_SCHEMA);
    this.initialized = true;
    this.logger.log("Postgres audit repository ready");
  }

  async upsertObservation(observation: FileObservation): Promise<FileAuditRecord> {
    const result = await this.pool.query<FileAuditRow>(
      `INSERT INTO file_audit (source, file_path, last_modified, last_accessed, owner, checksum)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (file_path) DO UPDATE SET
         source = EXCLUDED.source,
         last_modified = EXCLUDED.last_modified,
         last_accessed = EXCLUDED.last_accessed,
         owner = EXCLUDED.owner,
         checksum = EXCLUDED.checksum,
         status = 'Active',
         archive_url = NULL,
         last_error = NULL
       RETURNING ${COLUMNS}`,
      [
        observation.source,
        observation.path,
        observation.lastModified,
        observation.lastAccessed,
        observation.owner,
        observation.fingerprint,
      ],
    );
    return toRecord(result.rows[0]);
  }

  async findById(id: number): Promise<FileAuditRecord | undefined> {
    const result = await this.pool.query<FileAuditRow>(
      `SELECT ${COLUMNS} FROM file_audit WHERE id = $1`,
      [id],
    );
    return result.rows.length === 0 ? undefined : toRecord(result.rows[0]);
  }

  async findByPath(path: string): Promise<FileAuditRecord | undefined> {
    const result = await this.pool.query<FileAuditRow>(
      `SELECT ${COLUMNS} FROM file_audit WHERE file_path = $1`,
      [path],
    );
    return result.rows.length === 0 ? undefined : toRecord(result.rows[0]);
  }

  async listRecent(options: ListRecordsOptions): Promise<FileAuditRecord[]> {
    const result = await this.pool.query<FileAuditRow>(
      `SELECT ${COLUMNS} FROM file_audit
       WHERE ($1::text IS NULL OR status = $1)
       ORDER BY created_at DESC, id DESC
       LIMIT $2`,
      [options.status ?? null, options.limit],
    );
    return result.rows.map(toRecord);
  }

  async countByStatus(): Promise<StatusCounts> {
    const result = await this.pool.query<{ status: string; total: string }>(
      "SELECT status, COUNT(*) AS total FROM file_audit GROUP BY status",
    );
    const counts = emptyStatusCounts();
    for (const row of result.rows) {
      if (isFileStatus(row.status)) {
        counts[row.status] = Number(row.total);
      }
    }
    return counts;
  }

  async markArchived(id: number, archiveRef: string, fingerprint: string): Promise<FileAuditRecord | undefined> {
    return this.updateOne(
      `UPDATE file_audit SET status = 'Archived', archive_url = $2, checksum = $3, last_error = NULL
       WHERE id = $1 RETURNING ${COLUMNS}`,
      [id, archiveRef, fingerprint],
    );
  }

  async markArchiveFailed(id: number, reason: string): Promise<FileAuditRecord | undefined> {
    return this.updateOne(
      `UPDATE file_audit SET status = 'ArchiveFailed', archive_url = NULL, last_error = $2
       WHERE id = $1 RETURNING ${COLUMNS}`,
      [id, reason],
    );
  }

  async markRestoring(id: number): Promise<FileAuditRecord | undefined> {
    return this.updateOne(
      `UPDATE file_audit SET status = 'Restoring'
       WHERE id = $1 AND archive_url IS NOT NULL AND status IN ('Archived', 'Restoring')
       RETURNING ${COLUMNS}`,
      [id],
    );
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end();
  }

  private async updateOne(sql: string, values: unknown[]): Promise<FileAuditRecord | undefined> {
    const result = await this.pool.query<FileAuditRow>(sql, values);
    return result.rows.length === 0 ? undefined : toRecord(result.rows[0]);
  }
}

function toRecord(row: FileAuditRow): FileAuditRecord {
  if (!isFileSource(row.source) || !isFileStatus(row.status)) {
    throw new Error(`Unexpected file_audit row ${row.id}: source=${row.source} status=${row.status}`);
  }
  return {
    id: row.id,
    source: row.source,
    path: row.file_path,
    fingerprint: row.checksum,
    lastModified: row.last_modified,
    lastAccessed: row.last_accessed,
    owner: row.owner ?? "Unknown",
    status: row.status,
    archiveRef: row.archive_url ?? undefined,
    lastError: row.last_error ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
