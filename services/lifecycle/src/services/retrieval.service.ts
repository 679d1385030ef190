import { constants, createReadStream } from "node:fs";
import { access, mkdir, mkdtemp, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { Readable } from "node:stream";

import { Inject, Injectable, Logger } from "@nestjs/common";

import type { RemoteLibraryClient } from "../clients/graph.client.js";
import type { AppConfig } from "../config.js";
import {
  FingerprintMismatchError,
  InvalidStateError,
  NotReadableError,
  PathEscapeError,
  RecordNotFoundError,
  RestoreInProgressError,
  describeError,
  errnoCode,
} from "../errors.js";
import { fingerprintFile, fingerprintsMatch } from "../fingerprint.js";
import { resolveWithinRoot } from "../paths.js";
import type { AuditRepository } from "../repository/audit.repository.js";
import { ColdObjectNotRestoredError } from "../storage/cold-storage.service.js";
import type { ColdStorageService } from "../storage/cold-storage.service.js";
import { withIdleTimeout } from "../streams.js";
import { APP_CONFIG, AUDIT_REPOSITORY, COLD_STORAGE, REMOTE_LIBRARY } from "../tokens.js";
import { assertNever } from "../types.js";
import type { FileAuditRecord } from "../types.js";

const DEFAULT_CONTENT_TYPE = "application/octet-stream";
const STAGING_PREFIX = "lifecycle-restore-";

export interface DownloadHandle {
  stream: Readable;
  fileName: string;
  contentType: string;
  length?: number;
}

@Injectable()
export class RetrievalService {
  private readonly logger = new Logger(RetrievalService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(AUDIT_REPOSITORY) private readonly repository: AuditRepository,
    @Inject(COLD_STORAGE) private readonly storage: ColdStorageService,
    @Inject(REMOTE_LIBRARY) private readonly remoteLibrary: RemoteLibraryClient,
  ) {}

  async download(id: number): Promise<DownloadHandle> {
    const record = await this.repository.findById(id);
    if (!record) {
      throw new RecordNotFoundError(`File ${id} not found`);
    }

    switch (record.status) {
      case "Active":
      case "ArchiveFailed":
        return this.fromSource(record);
      case "Archived":
        throw new InvalidStateError(
          record.id,
          record.status,
          "File is archived in cold storage. Request a restore first, then download it once the restore completes.",
        );
      case "Restoring":
        return this.fromColdTier(record);
      default:
        return assertNever(record.status);
    }
  }

  private fromSource(record: FileAuditRecord): Promise<DownloadHandle> {
    switch (record.source) {
      case "file-server":
        return this.fromFileServer(record);
      case "remote-library":
        return this.fromRemoteLibrary(record);
      default:
        return assertNever(record.source);
    }
  }

  private async fromFileServer(record: FileAuditRecord): Promise<DownloadHandle> {
    const root = this.config.lifecycle.fileServerRoot;
    if (!root) {
      throw new InvalidStateError(record.id, record.status, "Local downloads are disabled: FILE_SERVER_ROOT is not configured");
    }

    let filePath: string;
    let size: number;
    try {
      filePath = (await resolveWithinRoot(root, record.path)).path;
      const stats = await stat(filePath);
      if (!stats.isFile()) {
        throw new NotReadableError(record.path, "not a regular file");
      }
      await access(filePath, constants.R_OK);
      size = stats.size;
    } catch (error) {
      throw toLocalFileError(record, error);
    }

    const { chunkSizeBytes, transferTimeoutMs } = this.config.lifecycle;
    return {
      stream: withIdleTimeout(createReadStream(filePath, { highWaterMark: chunkSizeBytes }), transferTimeoutMs),
      fileName: path.basename(record.path),
      contentType: DEFAULT_CONTENT_TYPE,
      length: size,
    };
  }

  private async fromRemoteLibrary(record: FileAuditRecord): Promise<DownloadHandle> {
    const content = await this.remoteLibrary.openContent(record.path);
    return {
      stream: withIdleTimeout(content.stream, this.config.lifecycle.transferTimeoutMs),
      fileName: fileNameFromUrl(record.path),
      contentType: content.contentType ?? DEFAULT_CONTENT_TYPE,
      length: content.length,
    };
  }

  /**
   * Rehydrated objects are staged and checked against their archived
   * fingerprint before any byte reaches the caller. The staging directory is
   * removed on failure, or once the returned stream closes.
   */
  private async fromColdTier(record: FileAuditRecord): Promise<DownloadHandle> {
    const ref = record.archiveRef;
    if (!ref) {
      throw new InvalidStateError(record.id, record.status, "Record is marked restoring but has no archive reference");
    }

    const info = await this.storage.describe(ref);
    switch (info.rehydration) {
      case "cold":
      case "in-progress":
        throw new RestoreInProgressError(record.id);
      case "available":
      case "not-required":
        break;
      default:
        return assertNever(info.rehydration);
    }

    const stagingDir = await this.createStagingDir();
    const staged = path.join(stagingDir, "object");
    let size: number;
    try {
      await this.storage.downloadTo(ref, staged);
      const expected = info.fingerprint ?? record.fingerprint;
      const actual = await fingerprintFile(staged, this.config.lifecycle.chunkSizeBytes);
      if (!fingerprintsMatch(expected, actual)) {
        throw new FingerprintMismatchError(expected, actual, ref);
      }
      size = (await stat(staged)).size;
    } catch (error) {
      await this.discard(stagingDir);
      if (error instanceof ColdObjectNotRestoredError) {
        throw new RestoreInProgressError(record.id);
      }
      if (error instanceof FingerprintMismatchError) {
        this.logger.error(`Restored copy of ${record.path} failed verification: ${error.message}`);
      }
      throw error;
    }

    const { chunkSizeBytes, transferTimeoutMs } = this.config.lifecycle;
    const stream = withIdleTimeout(createReadStream(staged, { highWaterMark: chunkSizeBytes }), transferTimeoutMs);
    stream.once("close", () => {
      void this.discard(stagingDir);
    });
    this.logger.log(`Serving restored copy of ${record.path} from ${ref}`);
    return {
      stream,
      fileName: path.basename(info.originalPath ?? record.path),
      contentType: DEFAULT_CONTENT_TYPE,
      length: size,
    };
  }

  private async createStagingDir(): Promise<string> {
    const base = this.config.lifecycle.stagingDir ?? tmpdir();
    await mkdir(base, { recursive: true });
    return mkdtemp(path.join(base, STAGING_PREFIX));
  }

  private async discard(stagingDir: string): Promise<void> {
    try {
      await rm(stagingDir, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn(`Could not remove staging directory ${stagingDir}: ${describeError(error)}`);
    }
  }
}

function toLocalFileError(record: FileAuditRecord, error: unknown): Error {
  if (error instanceof PathEscapeError || error instanceof NotReadableError) {
    return error;
  }
  switch (errnoCode(error)) {
    case "ENOENT":
    case "ENOTDIR":
      return new RecordNotFoundError(`File ${record.path} no longer exists on the file server`, { cause: error });
    case "EACCES":
    case "EPERM":
    case "EBUSY":
      return new NotReadableError(record.path, "permission denied", { cause: error });
    default:
      return error instanceof Error ? error : new Error(describeError(error));
  }
}

function fileNameFromUrl(webUrl: string): string {
  const last = new URL(webUrl).pathname.split("/").filter(Boolean).pop() ?? "download";
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}
