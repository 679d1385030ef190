import { Readable } from "node:stream";

import { Inject, Injectable, Logger } from "@nestjs/common";
import fetch from "node-fetch";
import type { RequestInit, Response } from "node-fetch";
import { z } from "zod";

import { isRemoteLibraryConfigured } from "../config.js";
import type { AppConfig, RemoteLibraryConfig } from "../config.js";
import { CollaboratorError, describeError } from "../errors.js";
import type { CollaboratorErrorKind } from "../errors.js";
import { APP_CONFIG } from "../tokens.js";
import { encodeSharingToken } from "./sharing-token.js";

export interface RemoteLibraryItem {
  webUrl: string;
  name: string;
  lastModified: Date;
  created: Date;
  owner: string;
  size?: number;
}

export type RemoteLibraryListing =
  | { ok: true; item: RemoteLibraryItem }
  | { ok: false; name: string; error: string };

export interface RemoteContent {
  stream: Readable;
  contentType?: string;
  length?: number;
}

export interface RemoteLibraryClient {
  isConfigured(): boolean;
  listItems(): AsyncIterable<RemoteLibraryListing>;
  openContent(webUrl: string): Promise<RemoteContent>;
}

const tokenSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().int().positive().default(3600),
});

const siteSchema = z.object({
  id: z.string(),
  drive: z.object({ id: z.string() }),
});

const pageSchema = z.object({
  value: z.array(z.record(z.unknown())).default([]),
  "@odata.nextLink": z.string().optional(),
});

const fileItemSchema = z.object({
  name: z.string().default(""),
  webUrl: z.string().url(),
  lastModifiedDateTime: z.string().datetime({ offset: true }),
  createdDateTime: z.string().datetime({ offset: true }),
  size: z.number().optional(),
  createdBy: z
    .object({
      user: z.object({ displayName: z.string().optional() }).optional(),
    })
    .optional(),
});

const errorBodySchema = z.object({
  error: z.object({ code: z.string().optional(), message: z.string().optional() }),
});

const TOKEN_REFRESH_MARGIN_MS = 60_000;

/** Missing owners are reported as "Unknown"; everything else is required. */
export function toRemoteLibraryItem(raw: unknown): RemoteLibraryItem {
  const parsed = fileItemSchema.parse(raw);
  return {
    webUrl: parsed.webUrl,
    name: parsed.name,
    lastModified: new Date(parsed.lastModifiedDateTime),
    created: new Date(parsed.createdDateTime),
    owner: parsed.createdBy?.user?.displayName ?? "Unknown",
    size: parsed.size,
  };
}

@Injectable()
export class GraphRemoteLibraryClient implements RemoteLibraryClient {
  private readonly logger = new Logger(GraphRemoteLibraryClient.name);
  private readonly settings: RemoteLibraryConfig;
  private cachedToken?: { value: string; expiresAt: number };

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    this.settings = config.remoteLibrary;
  }

  isConfigured(): boolean {
    return isRemoteLibraryConfigured(this.settings);
  }

  async *listItems(): AsyncIterable<RemoteLibraryListing> {
    const driveId = await this.resolveDriveId();
    this.logger.log(`Scanning document library drive ${driveId}`);
    let next: string | undefined = `${this.baseUrl()}/drives/${encodeURIComponent(driveId)}/root/descendants`;
    while (next) {
      const page = pageSchema.parse(await this.getJson(next, "list library items"));
      for (const raw of page.value) {
        if (!("file" in raw)) {
          continue;
        }
        try {
          yield { ok: true, item: toRemoteLibraryItem(raw) };
        } catch (error) {
          const name = typeof raw.name === "string" ? raw.name : "unknown";
          yield { ok: false, name, error: describeError(error) };
        }
      }
      next = page["@odata.nextLink"];
    }
  }

  async openContent(webUrl: string): Promise<RemoteContent> {
    const token = encodeSharingToken(webUrl);
    const response = await this.send(
      `${this.baseUrl()}/shares/${token}/driveItem/content`,
      { method: "GET", headers: { Authorization: `Bearer ${await this.accessToken()}` } },
      `download ${webUrl}`,
    );
    if (!response.body) {
      throw new CollaboratorError("remote-library", "unavailable", `Remote library returned no content for ${webUrl}`);
    }
    const length = Number(response.headers.get("content-length") ?? Number.NaN);
    return {
      stream: response.body instanceof Readable ? response.body : Readable.from(response.body),
      contentType: response.headers.get("content-type") ?? undefined,
      length: Number.isFinite(length) ? length : undefined,
    };
  }

  private async resolveDriveId(): Promise<string> {
    const { siteId } = this.settings;
    if (!siteId) {
      throw new Error("SHAREPOINT_SITE_ID is not configured");
    }
    const [hostname, sitePath] = siteId.split(",");
    const site = siteSchema.parse(
      await this.getJson(`${this.baseUrl()}/sites/${hostname}:/sites/${sitePath}?$expand=drive`, "resolve site"),
    );
    return site.drive.id;
  }

  private async accessToken(): Promise<string> {
    if (this.cachedToken && this.cachedToken.expiresAt - TOKEN_REFRESH_MARGIN_MS > Date.now()) {
      return this.cachedToken.value;
    }
    const { tenantId, clientId, clientSecret, authorityUrl } = this.settings;
    if (!tenantId || !clientId || !clientSecret) {
      throw new Error("Graph credentials are not configured");
    }
    const response = await this.send(
      `${authorityUrl.replace(/\/$/, "")}/${encodeURIComponent(tenantId)}/oauth2/v2.0/token`,
      {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams({
          client_id: clientId,
          client_secret: clientSecret,
          scope: "https://graph.microsoft.com/.default",
          grant_type: "client_credentials",
        }).toString(),
      },
      "acquire access token",
    );
    const token = tokenSchema.parse(await response.json());
    this.cachedToken = { value: token.access_token, expiresAt: Date.now() + token.expires_in * 1000 };
    return token.access_token;
  }

  private async getJson(url: string, action: string): Promise<unknown> {
    const response = await this.send(
      url,
      {
        method: "GET",
        headers: { Authorization: `Bearer ${await this.accessToken()}`, Accept: "application/json" },
      },
      action,
    );
    return response.json();
  }

  private async send(url: string, init: RequestInit, action: string): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.settings.timeoutMs);
    try {
      const response = await fetch(url, { ...init, signal: controller.signal });
      if (!response.ok) {
        throw await this.toCollaboratorError(response, action);
      }
      return response;
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new CollaboratorError(
          "remote-library",
          "timeout",
          `Remote library did not answer within ${this.settings.timeoutMs} ms while trying to ${action}`,
        );
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }

  private async toCollaboratorError(response: Response, action: string): Promise<CollaboratorError> {
    const text = await response.text();
    let detail = text;
    try {
      const parsed = errorBodySchema.safeParse(JSON.parse(text));
      if (parsed.success) {
        detail = parsed.data.error.message ?? parsed.data.error.code ?? text;
      }
    } catch {
      detail = text;
    }
    const kind = kindForStatus(response.status);
    const message = `${guidanceFor(kind)} (failed to ${action}: ${response.status} ${detail || response.statusText})`;
    this.logger.error(message);
    return new CollaboratorError("remote-library", kind, message, response.status);
  }

  private baseUrl(): string {
    return this.settings.graphBaseUrl.replace(/\/$/, "");
  }
}

function kindForStatus(status: number): CollaboratorErrorKind {
  switch (status) {
    case 401:
      return "unauthorized";
    case 403:
      return "forbidden";
    case 404:
      return "not-found";
    case 429:
      return "rate-limited";
    default:
      return "unavailable";
  }
}

function guidanceFor(kind: CollaboratorErrorKind): string {
  switch (kind) {
    case "unauthorized":
      return "The document library rejected the service credentials; check the Graph app registration";
    case "forbidden":
      return "The service account is not allowed to read this document";
    case "not-found":
      return "The document no longer exists in the library";
    case "rate-limited":
      return "The document library is throttling requests; try again later";
    case "timeout":
      return "The document library did not respond in time";
    case "unavailable":
      return "The document library request failed";
  }
}
