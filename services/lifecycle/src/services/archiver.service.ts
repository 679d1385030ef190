import { constants, createReadStream } from "node:fs";
import { access, stat, unlink } from "node:fs/promises";
import { pipeline } from "node:stream";

import { Inject, Injectable, Logger } from "@nestjs/common";

import type { AppConfig } from "../config.js";
import {
  FingerprintMismatchError,
  InvalidStateError,
  NotReadableError,
  PathEscapeError,
  describeError,
  errnoCode,
} from "../errors.js";
import { fingerprintFile, fingerprintsMatch, hashingPassThrough } from "../fingerprint.js";
import { assertWithinRoot, relativeKey, resolveWithinRoot } from "../paths.js";
import type { ResolvedPath } from "../paths.js";
import type { AuditRepository } from "../repository/audit.repository.js";
import type { ColdStorageService } from "../storage/cold-storage.service.js";
import { APP_CONFIG, AUDIT_REPOSITORY, COLD_STORAGE } from "../tokens.js";
import type { FileAuditRecord } from "../types.js";

export type ArchiveOutcome =
  | { kind: "archived"; record: FileAuditRecord; fingerprint: string }
  | { kind: "failed"; record: FileAuditRecord; error: Error };

/**
 * Moves one file-server file to the cold tier. The steps run as a saga:
 * upload, verify, record `Archived`, then delete the local copy once the
 * stored status still points at the uploaded object. Any failure leaves the
 * local file in place and the record `ArchiveFailed`.
 */
@Injectable()
export class ArchiverService {
  private readonly logger = new Logger(ArchiverService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(AUDIT_REPOSITORY) private readonly repository: AuditRepository,
    @Inject(COLD_STORAGE) private readonly storage: ColdStorageService,
  ) {}

  /**
   * Throws PathEscapeError (without touching disk, storage or the audit store)
   * when the record's path leaves the configured root. Every other failure is
   * returned as a `failed` outcome.
   */
  async archive(record: FileAuditRecord, now: Date = new Date()): Promise<ArchiveOutcome> {
    const root = this.config.lifecycle.fileServerRoot;
    if (record.source !== "file-server") {
      throw new InvalidStateError(record.id, record.status, "Only file-server files can be archived");
    }
    if (!root) {
      throw new InvalidStateError(record.id, record.status, "FILE_SERVER_ROOT is not configured");
    }
    assertWithinRoot(root, record.path);

    let resolved: ResolvedPath;
    let size: number;
    try {
      resolved = await resolveWithinRoot(root, record.path);
      size = await this.checkReadableFile(resolved.path);
    } catch (error) {
      if (error instanceof PathEscapeError) {
        throw error;
      }
      return this.fail(record, toNotReadable(record.path, error));
    }

    try {
      return await this.migrate(record, resolved, size, now);
    } catch (error) {
      return this.fail(record, error);
    }
  }

  private async migrate(
    record: FileAuditRecord,
    resolved: ResolvedPath,
    size: number,
    archivedAt: Date,
  ): Promise<ArchiveOutcome> {
    const { chunkSizeBytes } = this.config.lifecycle;
    const fingerprint = await fingerprintFile(resolved.path, chunkSizeBytes);
    if (!fingerprintsMatch(record.fingerprint, fingerprint)) {
      this.logger.warn(`${record.path} changed since it was scanned; archiving current content ${fingerprint}`);
    }

    const hashing = hashingPassThrough();
    const body = pipeline(
      createReadStream(resolved.path, { highWaterMark: chunkSizeBytes }),
      hashing.stream,
      (error) => {
        if (error) {
          this.logger.warn(`Reading ${record.path} for upload failed: ${error.message}`);
        }
      },
    );
    let ref: string;
    try {
      ref = await this.storage.upload({
        key: relativeKey(resolved.root, resolved.path),
        body,
        contentLength: size,
        metadata: { originalPath: record.path, fingerprint, archivedAt },
      });
    } catch (error) {
      body.destroy();
      throw error;
    }

    if (!fingerprintsMatch(fingerprint, hashing.digest())) {
      throw new FingerprintMismatchError(fingerprint, hashing.digest(), `${record.path} (modified during upload)`);
    }
    await this.verifyStoredObject(ref, fingerprint);

    const archived = await this.repository.markArchived(record.id, ref, fingerprint);
    if (!archived) {
      throw new Error(`Audit record ${record.id} disappeared before it could be marked archived`);
    }
    await this.removeLocalCopy(archived, resolved.path);

    this.logger.log(`Archived and removed ${record.path} -> ${ref}`);
    return { kind: "archived", record: archived, fingerprint };
  }

  private async checkReadableFile(path: string): Promise<number> {
    const stats = await stat(path);
    if (!stats.isFile()) {
      throw new NotReadableError(path, "not a regular file");
    }
    await access(path, constants.R_OK);
    return stats.size;
  }

  private async verifyStoredObject(ref: string, fingerprint: string): Promise<void> {
    let stored: string | undefined;
    try {
      stored = (await this.storage.describe(ref)).fingerprint;
    } catch (error) {
      this.logger.warn(`Could not verify ${ref}: ${describeError(error)}`);
      return;
    }
    if (stored === undefined) {
      this.logger.warn(`${ref} carries no fingerprint metadata; skipping integrity check`);
      return;
    }
    if (!fingerprintsMatch(fingerprint, stored)) {
      throw new FingerprintMismatchError(fingerprint, stored, ref);
    }
    this.logger.log(`Integrity of ${ref} verified`);
  }

  /** Deletes only while the audit store still says this exact object holds the bytes. */
  private async removeLocalCopy(archived: FileAuditRecord, path: string): Promise<void> {
    const current = await this.repository.findById(archived.id);
    if (current?.status !== "Archived" || current.archiveRef !== archived.archiveRef) {
      throw new Error(`Record ${archived.id} changed before the local copy was removed; keeping ${path}`);
    }
    try {
      await unlink(path);
    } catch (error) {
      if (errnoCode(error) !== "ENOENT") {
        throw error;
      }
    }
  }

  private async fail(record: FileAuditRecord, error: unknown): Promise<ArchiveOutcome> {
    const failure = error instanceof Error ? error : new Error(describeError(error));
    this.logger.error(`Failed to archive ${record.path}: ${failure.message}`);
    const updated = await this.repository
      .markArchiveFailed(record.id, failure.message)
      .catch((updateError: unknown) => {
        this.logger.error(`Could not record archive failure for ${record.path}: ${describeError(updateError)}`);
        return undefined;
      });
    return { kind: "failed", record: updated ?? record, error: failure };
  }
}

function toNotReadable(path: string, error: unknown): NotReadableError {
  if (error instanceof NotReadableError) {
    return error;
  }
  const code = errnoCode(error);
  const reason = code === "ENOENT" ? "file no longer exists" : code ?? describeError(error);
  return new NotReadableError(path, reason, { cause: error });
}
