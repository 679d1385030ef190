import { createHash } from "node:crypto";
import { mkdir, readdir, symlink, utimes, writeFile } from "node:fs/promises";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { AppConfig } from "../src/config.js";
import {
  CollaboratorError,
  FingerprintMismatchError,
  InvalidStateError,
  PathEscapeError,
  RecordNotFoundError,
  RestoreInProgressError,
} from "../src/errors.js";
import { fingerprintFile } from "../src/fingerprint.js";
import { InMemoryAuditRepository } from "../src/repository/memory.repository.js";
import { ArchiverService } from "../src/services/archiver.service.js";
import { RestoreService } from "../src/services/restore.service.js";
import { RetrievalService } from "../src/services/retrieval.service.js";
import { ScannerService } from "../src/services/scanner.service.js";
import { ColdObjectNotRestoredError } from "../src/storage/cold-storage.service.js";
import type { ColdObjectInfo } from "../src/storage/cold-storage.service.js";
import { InMemoryColdStorage } from "../src/storage/memory.storage.js";
import { readAll } from "../src/streams.js";
import type { FileAuditRecord } from "../src/types.js";
import { FakeRemoteLibrary, daysBefore, makeTempDir, removeDir, testConfig } from "./support.js";

const PLAN_URL = "https://contoso.sharepoint.com/sites/ops/plan.docx";

class StillFrozenStorage extends InMemoryColdStorage {
  override async describe(ref: string): Promise<ColdObjectInfo> {
    return { ...(await super.describe(ref)), rehydration: "available" };
  }

  override async downloadTo(ref: string, _destination: string): Promise<void> {
    throw new ColdObjectNotRestoredError(ref);
  }
}

describe("RetrievalService", () => {
  let sandbox: string;
  let root: string;
  let stagingDir: string;
  let config: AppConfig;
  let repository: InMemoryAuditRepository;
  let storage: InMemoryColdStorage;
  let library: FakeRemoteLibrary;
  let retrieval: RetrievalService;

  beforeEach(async () => {
    sandbox = await makeTempDir("retrieval");
    root = path.join(sandbox, "files");
    stagingDir = path.join(sandbox, "staging");
    await mkdir(root);
    config = testConfig({ FILE_SERVER_ROOT: root, STAGING_DIR: stagingDir });
    repository = new InMemoryAuditRepository();
    storage = new InMemoryColdStorage();
    library = new FakeRemoteLibrary().withContent(PLAN_URL, "plan contents");
    retrieval = new RetrievalService(config, repository, storage, library);
  });

  afterEach(async () => {
    await removeDir(sandbox);
  });

  async function observeLocal(name: string, content: string): Promise<FileAuditRecord> {
    const filePath = path.join(root, name);
    await writeFile(filePath, content);
    return repository.upsertObservation({
      source: "file-server",
      path: filePath,
      fingerprint: await fingerprintFile(filePath),
      lastModified: new Date("2023-01-01T00:00:00.000Z"),
      lastAccessed: new Date("2023-01-01T00:00:00.000Z"),
      owner: "system",
    });
  }

  async function restoring(name: string, content: string, target: InMemoryColdStorage = storage): Promise<FileAuditRecord> {
    const record = await observeLocal(name, content);
    const archived = await new ArchiverService(config, repository, target).archive(record);
    if (archived.kind !== "archived") {
      throw archived.error;
    }
    return (await new RestoreService(config, repository, target).requestRestore(record.id)).record;
  }

  it("streams active file-server files", async () => {
    const record = await observeLocal("q1.txt", "hello cold storage");

    const handle = await retrieval.download(record.id);

    expect(handle.fileName).toBe("q1.txt");
    expect(handle.length).toBe(18);
    expect(handle.contentType).toBe("application/octet-stream");
    expect((await readAll(handle.stream)).toString()).toBe("hello cold storage");
  });

  it("serves files whose archive attempt failed from their original location", async () => {
    const record = await observeLocal("q1.txt", "hello cold storage");
    await repository.markArchiveFailed(record.id, "upload timed out");

    const handle = await retrieval.download(record.id);

    expect((await readAll(handle.stream)).toString()).toBe("hello cold storage");
  });

  it("reports unknown ids and missing local files as not found", async () => {
    await expect(retrieval.download(999)).rejects.toThrow(new RecordNotFoundError("File 999 not found"));

    const record = await observeLocal("gone.txt", "soon gone");
    await removeDir(record.path);

    await expect(retrieval.download(record.id)).rejects.toBeInstanceOf(RecordNotFoundError);
  });

  it("refuses local paths that escape the root", async () => {
    const target = path.join(sandbox, "secret.txt");
    await writeFile(target, "secret");
    const link = path.join(root, "secret.txt");
    await symlink(target, link);
    const record = await repository.upsertObservation({
      source: "file-server",
      path: link,
      fingerprint: "d41d8cd98f00b204e9800998ecf8427e",
      lastModified: new Date("2024-01-01T00:00:00.000Z"),
      lastAccessed: new Date("2024-01-01T00:00:00.000Z"),
      owner: "system",
    });

    await expect(retrieval.download(record.id)).rejects.toBeInstanceOf(PathEscapeError);
  });

  it("streams active remote-library items through the library client", async () => {
    const record = await repository.upsertObservation({
      source: "remote-library",
      path: PLAN_URL,
      fingerprint: "ff5639b1150d1c519ff1f933e2d50c18",
      lastModified: new Date("2024-03-01T09:30:00.000Z"),
      lastAccessed: new Date("2024-03-01T09:30:00.000Z"),
      owner: "Dana Ops",
    });

    const handle = await retrieval.download(record.id);

    expect(handle).toMatchObject({ fileName: "plan.docx", contentType: "text/plain", length: 13 });
    expect((await readAll(handle.stream)).toString()).toBe("plan contents");
    expect(library.opened).toEqual([PLAN_URL]);
  });

  it("surfaces library errors", async () => {
    const record = await repository.upsertObservation({
      source: "remote-library",
      path: "https://contoso.sharepoint.com/sites/ops/removed.docx",
      fingerprint: "d41d8cd98f00b204e9800998ecf8427e",
      lastModified: new Date("2024-03-01T09:30:00.000Z"),
      lastAccessed: new Date("2024-03-01T09:30:00.000Z"),
      owner: "Unknown",
    });

    await expect(retrieval.download(record.id)).rejects.toMatchObject({ kind: "not-found" });
    await expect(retrieval.download(record.id)).rejects.toBeInstanceOf(CollaboratorError);
  });

  it("asks for a restore before serving archived files", async () => {
    const record = await observeLocal("q1.txt", "hello cold storage");
    const archived = await new ArchiverService(config, repository, storage).archive(record);

    const failure = retrieval.download(archived.record.id);

    await expect(failure).rejects.toBeInstanceOf(InvalidStateError);
    await expect(retrieval.download(archived.record.id)).rejects.toThrow(/Request a restore first/);
  });

  it("reports restores that have not finished", async () => {
    const record = await restoring("q1.txt", "hello cold storage");

    await expect(retrieval.download(record.id)).rejects.toThrow(
      new RestoreInProgressError(record.id).message,
    );
    await expect(readdir(stagingDir).catch(() => [])).resolves.toEqual([]);
  });

  it("maps a provider that still refuses the download to restore in progress", async () => {
    const frozen = new StillFrozenStorage();
    const record = await restoring("q1.txt", "hello cold storage", frozen);
    retrieval = new RetrievalService(config, repository, frozen, library);

    await expect(retrieval.download(record.id)).rejects.toBeInstanceOf(RestoreInProgressError);
    await expect(readdir(stagingDir)).resolves.toEqual([]);
  });

  it("round-trips a 10 MiB file through archive, restore and download", async () => {
    const content = Buffer.alloc(10 * 1024 * 1024);
    for (let index = 0; index < content.length; index += 1) {
      content[index] = index % 251;
    }
    const expected = createHash("md5").update(content).digest("hex");
    const filePath = path.join(root, "large.bin");
    await writeFile(filePath, content);
    const now = new Date();
    await utimes(filePath, daysBefore(now, 200), daysBefore(now, 200));
    const scanner = new ScannerService(
      config,
      repository,
      library,
      new ArchiverService(config, repository, storage),
    );

    const summary = await scanner.scanFileServer(now);
    expect(summary.migrated).toBe(1);
    const record = await repository.findByPath(filePath);
    if (!record?.archiveRef) {
      throw new Error("large.bin was not archived");
    }
    await new RestoreService(config, repository, storage).requestRestore(record.id);
    storage.completeRestore(record.archiveRef);

    const handle = await retrieval.download(record.id);
    const downloaded = await readAll(handle.stream);

    expect(handle.length).toBe(content.length);
    expect(handle.fileName).toBe("large.bin");
    expect(createHash("md5").update(downloaded).digest("hex")).toBe(expected);
    await vi.waitFor(async () => {
      expect(await readdir(stagingDir)).toEqual([]);
    });
  });

  it("refuses corrupted restored copies and leaves nothing staged", async () => {
    const record = await restoring("q1.txt", "hello cold storage");
    if (!record.archiveRef) {
      throw new Error("q1.txt was not archived");
    }
    storage.completeRestore(record.archiveRef);
    storage.replaceContent(record.archiveRef, Buffer.from("tampered bytes"));

    await expect(retrieval.download(record.id)).rejects.toBeInstanceOf(FingerprintMismatchError);
    await expect(readdir(stagingDir)).resolves.toEqual([]);
  });

  it("falls back to the record fingerprint when the object carries none", async () => {
    const record = await restoring("q1.txt", "hello cold storage");
    if (!record.archiveRef) {
      throw new Error("q1.txt was not archived");
    }
    storage.completeRestore(record.archiveRef);
    storage.setMetadata(record.archiveRef, {});

    const handle = await retrieval.download(record.id);

    expect((await readAll(handle.stream)).toString()).toBe("hello cold storage");
  });
});
