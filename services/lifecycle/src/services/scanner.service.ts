import type { Dirent } from "node:fs";
import { constants } from "node:fs";
import { access, readdir, stat } from "node:fs/promises";
import path from "node:path";

import { Inject, Injectable, Logger } from "@nestjs/common";

import type { AppConfig } from "../config.js";
import type { RemoteLibraryClient } from "../clients/graph.client.js";
import { describeError, errnoCode } from "../errors.js";
import { fingerprintFile, fingerprintRemoteItem } from "../fingerprint.js";
import type { AuditRepository } from "../repository/audit.repository.js";
import { APP_CONFIG, AUDIT_REPOSITORY, REMOTE_LIBRARY } from "../tokens.js";
import type { FileSource } from "../types.js";
import { ArchiverService } from "./archiver.service.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const FILE_SERVER_PROGRESS_EVERY = 100;
const REMOTE_LIBRARY_PROGRESS_EVERY = 50;
const FILE_SERVER_OWNER = "system";

export type SkipReason = "not-readable" | "vanished" | "not-a-file";

export type ScanItemOutcome =
  | { kind: "processed"; path: string; recordId: number; candidate: boolean; migrated: boolean }
  | { kind: "skipped"; path: string; reason: SkipReason }
  | { kind: "failed"; path: string; error: string };

export interface ScanSummary {
  source: FileSource;
  startedAt: Date;
  processed: number;
  candidates: number;
  migrated: number;
  skipped: number;
  failed: number;
  items: ScanItemOutcome[];
  /** Set when the pass could not run at all or stopped early. */
  error?: string;
}

type WalkEntry = { kind: "file"; path: string } | { kind: "unreadable"; path: string; error: unknown };

/** A file is a candidate once it has gone unread for longer than the retention window. */
export function isMigrationCandidate(lastAccessed: Date, now: Date, retentionDays: number): boolean {
  return now.getTime() - lastAccessed.getTime() > retentionDays * DAY_MS;
}

@Injectable()
export class ScannerService {
  private readonly logger = new Logger(ScannerService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(AUDIT_REPOSITORY) private readonly repository: AuditRepository,
    @Inject(REMOTE_LIBRARY) private readonly remoteLibrary: RemoteLibraryClient,
    @Inject(ArchiverService) private readonly archiver: ArchiverService,
  ) {}

  async scanFileServer(now: Date = new Date()): Promise<ScanSummary> {
    const summary = emptySummary("file-server", now);
    const root = this.config.lifecycle.fileServerRoot;
    if (!root) {
      this.logger.warn("FILE_SERVER_ROOT is not configured; skipping file server scan");
      return { ...summary, error: "FILE_SERVER_ROOT is not configured" };
    }
    const rootStats = await stat(root).catch(() => undefined);
    if (!rootStats?.isDirectory()) {
      this.logger.warn(`File server path not found: ${root}`);
      return { ...summary, error: `File server path not found: ${root}` };
    }

    const threshold = new Date(now.getTime() - this.config.lifecycle.retentionDays * DAY_MS);
    this.logger.log(`Starting file server scan at ${root}; archiving files last read before ${threshold.toISOString()}`);

    for await (const entry of walkFiles(path.resolve(root))) {
      const outcome = entry.kind === "file"
        ? await this.scanLocalFile(entry.path, now)
        : skipForError(entry.path, entry.error);
      record(summary, outcome);
      if (outcome.kind === "processed" && summary.processed % FILE_SERVER_PROGRESS_EVERY === 0) {
        this.logger.log(`Processed ${summary.processed} files...`);
      }
    }

    this.logger.log(
      `File server scan completed: ${summary.processed} processed, ${summary.migrated} archived, `
        + `${summary.skipped} skipped, ${summary.failed} failed`,
    );
    return summary;
  }

  async scanRemoteLibrary(now: Date = new Date()): Promise<ScanSummary> {
    const summary = emptySummary("remote-library", now);
    if (!this.remoteLibrary.isConfigured()) {
      this.logger.warn("Document library credentials are missing; skipping remote library scan");
      return { ...summary, error: "Document library is not configured" };
    }

    try {
      for await (const listing of this.remoteLibrary.listItems()) {
        if (!listing.ok) {
          this.logger.error(`Failed to process library item ${listing.name}: ${listing.error}`);
          record(summary, { kind: "failed", path: listing.name, error: listing.error });
          continue;
        }
        const { item } = listing;
        try {
          const stored = await this.repository.upsertObservation({
            source: "remote-library",
            path: item.webUrl,
            fingerprint: fingerprintRemoteItem(item.webUrl, item.lastModified),
            lastModified: item.lastModified,
            lastAccessed: item.lastModified,
            owner: item.owner,
          });
          const candidate = isMigrationCandidate(stored.lastAccessed, now, this.config.lifecycle.retentionDays);
          record(summary, { kind: "processed", path: item.webUrl, recordId: stored.id, candidate, migrated: false });
        } catch (error) {
          this.logger.error(`Failed to record library item ${item.name}: ${describeError(error)}`);
          record(summary, { kind: "failed", path: item.webUrl, error: describeError(error) });
        }
        if (summary.processed > 0 && summary.processed % REMOTE_LIBRARY_PROGRESS_EVERY === 0) {
          this.logger.log(`Processed ${summary.processed} library files...`);
        }
      }
    } catch (error) {
      this.logger.error(`Document library scan failed: ${describeError(error)}`);
      return { ...summary, error: describeError(error) };
    }

    this.logger.log(`Document library scan completed: ${summary.processed} processed, ${summary.candidates} candidates`);
    return summary;
  }

  async scanAll(now: Date = new Date()): Promise<ScanSummary[]> {
    return [await this.scanFileServer(now), await this.scanRemoteLibrary(now)];
  }

  private async scanLocalFile(filePath: string, now: Date): Promise<ScanItemOutcome> {
    try {
      await access(filePath, constants.R_OK);
      const stats = await stat(filePath);
      if (!stats.isFile()) {
        return { kind: "skipped", path: filePath, reason: "not-a-file" };
      }
      const fingerprint = await fingerprintFile(filePath, this.config.lifecycle.chunkSizeBytes);
      const stored = await this.repository.upsertObservation({
        source: "file-server",
        path: filePath,
        fingerprint,
        lastModified: stats.mtime,
        lastAccessed: stats.atime,
        owner: FILE_SERVER_OWNER,
      });

      const candidate = isMigrationCandidate(stored.lastAccessed, now, this.config.lifecycle.retentionDays);
      if (!candidate) {
        return { kind: "processed", path: filePath, recordId: stored.id, candidate, migrated: false };
      }
      this.logger.log(`File eligible for archiving: ${filePath}`);
      const outcome = await this.archiver.archive(stored, now);
      return { kind: "processed", path: filePath, recordId: stored.id, candidate, migrated: outcome.kind === "archived" };
    } catch (error) {
      const outcome = skipForError(filePath, error);
      if (outcome.kind === "skipped") {
        this.logger.warn(`Skipped ${filePath} (${outcome.reason}): ${describeError(error)}`);
      } else {
        this.logger.error(`Unexpected error processing ${filePath}: ${describeError(error)}`);
      }
      return outcome;
    }
  }
}

function skipForError(filePath: string, error: unknown): ScanItemOutcome {
  switch (errnoCode(error)) {
    case "EACCES":
    case "EPERM":
    case "EBUSY":
      return { kind: "skipped", path: filePath, reason: "not-readable" };
    case "ENOENT":
      return { kind: "skipped", path: filePath, reason: "vanished" };
    default:
      return { kind: "failed", path: filePath, error: describeError(error) };
  }
}

function emptySummary(source: FileSource, startedAt: Date): ScanSummary {
  return { source, startedAt, processed: 0, candidates: 0, migrated: 0, skipped: 0, failed: 0, items: [] };
}

function record(summary: ScanSummary, outcome: ScanItemOutcome): void {
  summary.items.push(outcome);
  switch (outcome.kind) {
    case "processed":
      summary.processed += 1;
      summary.candidates += outcome.candidate ? 1 : 0;
      summary.migrated += outcome.migrated ? 1 : 0;
      break;
    case "skipped":
      summary.skipped += 1;
      break;
    case "failed":
      summary.failed += 1;
      break;
  }
}

async function* walkFiles(directory: string): AsyncGenerator<WalkEntry> {
  let entries: Dirent[];
  try {
    entries = await readdir(directory, { withFileTypes: true });
  } catch (error) {
    yield { kind: "unreadable", path: directory, error };
    return;
  }
  entries.sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    const entryPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      yield* walkFiles(entryPath);
    } else {
      yield { kind: "file", path: entryPath };
    }
  }
}
