import nock from "nock";
import { afterAll, afterEach, beforeEach, describe, expect, it } from "vitest";

import { GraphRemoteLibraryClient, toRemoteLibraryItem } from "../src/clients/graph.client.js";
import type { RemoteLibraryListing } from "../src/clients/graph.client.js";
import { CollaboratorError } from "../src/errors.js";
import { readAll } from "../src/streams.js";
import { testConfig } from "./support.js";

const GRAPH = "https://graph.test";
const LOGIN = "https://login.test";
const PLAN_TOKEN = "u!aHR0cHM6Ly9jb250b3NvLnNoYXJlcG9pbnQuY29tL3NpdGVzL29wcy9wbGFuLmRvY3g";

const planItem = {
  name: "plan.docx",
  webUrl: "https://contoso.sharepoint.com/sites/ops/plan.docx",
  lastModifiedDateTime: "2024-03-01T09:30:00Z",
  createdDateTime: "2024-01-15T08:00:00Z",
  size: 2048,
  file: { mimeType: "application/vnd.openxmlformats-officedocument.wordprocessingml.document" },
  createdBy: { user: { displayName: "Dana Ops" } },
};

function createClient(env: Record<string, string> = {}): GraphRemoteLibraryClient {
  return new GraphRemoteLibraryClient(
    testConfig({
      SHAREPOINT_SITE_ID: "contoso.sharepoint.com,finance,web-1",
      GRAPH_TENANT_ID: "tenant-1",
      GRAPH_CLIENT_ID: "client-1",
      GRAPH_CLIENT_SECRET: "test-secret",
      GRAPH_BASE_URL: `${GRAPH}/v1.0`,
      GRAPH_AUTHORITY_URL: LOGIN,
      ...env,
    }),
  );
}

function mockToken(): nock.Scope {
  return nock(LOGIN)
    .post("/tenant-1/oauth2/v2.0/token", (body: Record<string, string>) =>
      body.grant_type === "client_credentials" && body.client_secret === "test-secret")
    .reply(200, { access_token: "token-1", expires_in: 3600 });
}

async function collect(source: AsyncIterable<RemoteLibraryListing>): Promise<RemoteLibraryListing[]> {
  const listings: RemoteLibraryListing[] = [];
  for await (const listing of source) {
    listings.push(listing);
  }
  return listings;
}

describe("toRemoteLibraryItem", () => {
  it("defaults a missing owner to Unknown", () => {
    const { createdBy: _createdBy, ...withoutOwner } = planItem;

    expect(toRemoteLibraryItem(withoutOwner).owner).toBe("Unknown");
  });
});

describe("GraphRemoteLibraryClient", () => {
  beforeEach(() => {
    nock.disableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  it("reports whether credentials are present", () => {
    expect(createClient().isConfigured()).toBe(true);
    expect(createClient({ GRAPH_CLIENT_SECRET: "" }).isConfigured()).toBe(false);
  });

  it("walks every page of the drive and yields only files", async () => {
    const token = mockToken();
    const graph = nock(GRAPH, { reqheaders: { authorization: "Bearer token-1" } })
      .get("/v1.0/sites/contoso.sharepoint.com:/sites/finance")
      .query({ $expand: "drive" })
      .reply(200, { id: "site-1", drive: { id: "drive-1" } })
      .get("/v1.0/drives/drive-1/root/descendants")
      .reply(200, {
        value: [
          { name: "Reports", folder: { childCount: 2 } },
          planItem,
          { name: "broken.txt", file: {}, lastModifiedDateTime: "2024-03-01T09:30:00Z", createdDateTime: "2024-03-01T09:30:00Z" },
        ],
        "@odata.nextLink": `${GRAPH}/v1.0/drives/drive-1/root/descendants?$skiptoken=page-2`,
      })
      .get("/v1.0/drives/drive-1/root/descendants")
      .query({ $skiptoken: "page-2" })
      .reply(200, {
        value: [
          {
            name: "roadmap.pptx",
            webUrl: "https://contoso.sharepoint.com/sites/ops/roadmap.pptx",
            lastModifiedDateTime: "2024-12-20T12:00:00Z",
            createdDateTime: "2024-12-01T12:00:00Z",
            file: {},
          },
        ],
      });

    const listings = await collect(createClient().listItems());

    expect(listings).toHaveLength(3);
    expect(listings[0]).toEqual({
      ok: true,
      item: {
        webUrl: "https://contoso.sharepoint.com/sites/ops/plan.docx",
        name: "plan.docx",
        lastModified: new Date("2024-03-01T09:30:00.000Z"),
        created: new Date("2024-01-15T08:00:00.000Z"),
        owner: "Dana Ops",
        size: 2048,
      },
    });
    expect(listings[1]).toMatchObject({ ok: false, name: "broken.txt" });
    expect(listings[2]).toMatchObject({ ok: true, item: { name: "roadmap.pptx", owner: "Unknown" } });
    expect(token.isDone()).toBe(true);
    expect(graph.isDone()).toBe(true);
  });

  it("streams content addressed by sharing token", async () => {
    mockToken();
    nock(GRAPH)
      .get(`/v1.0/shares/${PLAN_TOKEN}/driveItem/content`)
      .reply(200, "plan contents", { "Content-Type": "text/plain", "Content-Length": "13" });

    const content = await createClient().openContent("https://contoso.sharepoint.com/sites/ops/plan.docx");

    expect(content.contentType).toBe("text/plain");
    expect(content.length).toBe(13);
    expect((await readAll(content.stream)).toString()).toBe("plan contents");
  });

  it.each([
    [401, "unauthorized"],
    [403, "forbidden"],
    [404, "not-found"],
    [429, "rate-limited"],
    [500, "unavailable"],
  ] as const)("maps a %i response to a %s error", async (status, kind) => {
    mockToken();
    nock(GRAPH)
      .get(`/v1.0/shares/${PLAN_TOKEN}/driveItem/content`)
      .reply(status, { error: { code: "failure", message: "Graph says no" } });

    const failure = createClient().openContent("https://contoso.sharepoint.com/sites/ops/plan.docx");

    await expect(failure).rejects.toBeInstanceOf(CollaboratorError);
    await expect(failure).rejects.toMatchObject({ collaborator: "remote-library", kind, status });
  });

  it("reports rejected credentials", async () => {
    nock(LOGIN)
      .post("/tenant-1/oauth2/v2.0/token")
      .reply(401, { error: { code: "invalid_client", message: "Invalid client secret" } });

    await expect(collect(createClient().listItems())).rejects.toMatchObject({ kind: "unauthorized", status: 401 });
  });

  it("gives up on slow responses", async () => {
    mockToken();
    nock(GRAPH)
      .get(`/v1.0/shares/${PLAN_TOKEN}/driveItem/content`)
      .delay(500)
      .reply(200, "late");

    const failure = createClient({ GRAPH_TIMEOUT_MS: "50" }).openContent(
      "https://contoso.sharepoint.com/sites/ops/plan.docx",
    );

    await expect(failure).rejects.toMatchObject({ kind: "timeout" });
  });
});
