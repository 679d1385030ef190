import { describe, expect, it } from "vitest";

import { isRemoteLibraryConfigured, loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config.port).toBe(8080);
    expect(config.database.url).toBeUndefined();
    expect(config.lifecycle).toEqual({
      retentionDays: 180,
      restoreDays: 5,
      restoreTier: "Standard",
      fileServerRoot: undefined,
      stagingDir: undefined,
      transferTimeoutMs: 30_000,
      chunkSizeBytes: 65_536,
    });
    expect(config.coldStorage.storageClass).toBe("DEEP_ARCHIVE");
    expect(config.remoteLibrary.graphBaseUrl).toBe("https://graph.microsoft.com/v1.0");
    expect(isRemoteLibraryConfigured(config.remoteLibrary)).toBe(false);
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      PORT: "9000",
      RETENTION_DAYS: "30",
      RESTORE_TIER: "Bulk",
      FILE_SERVER_ROOT: "/srv/files",
      ARCHIVE_BUCKET: "archive-bucket",
      S3_STORAGE_CLASS: "GLACIER",
      SHAREPOINT_SITE_ID: "contoso.sharepoint.com,finance,web-1",
      GRAPH_TENANT_ID: "tenant-1",
      GRAPH_CLIENT_ID: "client-1",
      GRAPH_CLIENT_SECRET: "test-secret",
    });

    expect(config.port).toBe(9000);
    expect(config.lifecycle.retentionDays).toBe(30);
    expect(config.lifecycle.restoreTier).toBe("Bulk");
    expect(config.lifecycle.fileServerRoot).toBe("/srv/files");
    expect(config.coldStorage.bucket).toBe("archive-bucket");
    expect(config.coldStorage.storageClass).toBe("GLACIER");
    expect(isRemoteLibraryConfigured(config.remoteLibrary)).toBe(true);
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ RETENTION_DAYS: "", ARCHIVE_BUCKET: "  " });

    expect(config.lifecycle.retentionDays).toBe(180);
    expect(config.coldStorage.bucket).toBeUndefined();
  });

  it("rejects a malformed site id", () => {
    expect(() => loadConfig({ SHAREPOINT_SITE_ID: "contoso.sharepoint.com" })).toThrow(
      /hostname,site-path,web-id/,
    );
  });

  it("rejects unknown storage classes and non-numeric windows", () => {
    expect(() => loadConfig({ S3_STORAGE_CLASS: "TAPE" })).toThrow();
    expect(() => loadConfig({ RETENTION_DAYS: "soon" })).toThrow();
  });
});
