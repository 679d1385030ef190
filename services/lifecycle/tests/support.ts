import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { Readable } from "node:stream";

import type { RemoteContent, RemoteLibraryClient, RemoteLibraryListing } from "../src/clients/graph.client.js";
import { loadConfig } from "../src/config.js";
import type { AppConfig } from "../src/config.js";
import { CollaboratorError } from "../src/errors.js";

export const DAY_MS = 24 * 60 * 60 * 1000;

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig(env);
}

export async function makeTempDir(label: string): Promise<string> {
  return mkdtemp(path.join(tmpdir(), `${label}-`));
}

export async function removeDir(dir: string | undefined): Promise<void> {
  if (dir) {
    await rm(dir, { recursive: true, force: true });
  }
}

export function daysBefore(now: Date, days: number): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

export class FakeRemoteLibrary implements RemoteLibraryClient {
  readonly opened: string[] = [];
  private readonly contents = new Map<string, Buffer>();

  constructor(
    private readonly listings: RemoteLibraryListing[] = [],
    private readonly configured = true,
  ) {}

  withContent(webUrl: string, data: string): this {
    this.contents.set(webUrl, Buffer.from(data));
    return this;
  }

  isConfigured(): boolean {
    return this.configured;
  }

  async *listItems(): AsyncIterable<RemoteLibraryListing> {
    for (const listing of this.listings) {
      yield listing;
    }
  }

  async openContent(webUrl: string): Promise<RemoteContent> {
    this.opened.push(webUrl);
    const data = this.contents.get(webUrl);
    if (!data) {
      throw new CollaboratorError("remote-library", "not-found", `The document no longer exists: ${webUrl}`, 404);
    }
    return { stream: Readable.from([data]), contentType: "text/plain", length: data.length };
  }
}
