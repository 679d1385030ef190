import type { ErrorResponse, RecentFilesQuery, RecentFilesResponse, RestoreResponse } from './types.js';

export interface LifecycleClientOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
  headers?: Record<string, string>;
}

export class LifecycleClientError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'LifecycleClientError';
  }
}

export class LifecycleClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: LifecycleClientOptions) {
    if (!options.baseUrl) {
      throw new Error('baseUrl is required');
    }
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.defaultHeaders = options.headers ?? {};
  }

  async listRecent(query: RecentFilesQuery = {}): Promise<RecentFilesResponse> {
    const params = new URLSearchParams();
    if (query.limit !== undefined) {
      params.set('limit', String(query.limit));
    }
    if (query.status) {
      params.set('status', query.status);
    }
    const search = params.toString();
    const response = await this.request(search ? `/?${search}` : '/', 'List request');
    const body: RecentFilesResponse = await response.json();
    return body;
  }

  /** Resolves with the file's bytes. Archived files must be restored first. */
  async download(id: number): Promise<ArrayBuffer> {
    const response = await this.request(`/download/${encodeURIComponent(String(id))}`, 'Download request');
    return response.arrayBuffer();
  }

  async restore(id: number): Promise<RestoreResponse> {
    const response = await this.request(`/restore/${encodeURIComponent(String(id))}`, 'Restore request');
    const body: RestoreResponse = await response.json();
    return body;
  }

  private async request(path: string, action: string): Promise<Response> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method: 'GET',
      headers: this.defaultHeaders,
    });

    if (!response.ok) {
      const message = await this.readErrorMessage(response);
      throw new LifecycleClientError(response.status, `${action} failed with ${response.status}: ${message}`);
    }
    return response;
  }

  private async readErrorMessage(response: Response): Promise<string> {
    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      return `<failed to read error body: ${String(err)}>`;
    }
    if (!text) {
      return '<empty>';
    }
    try {
      const body: Partial<ErrorResponse> = JSON.parse(text);
      if (Array.isArray(body.message)) {
        return body.message.join('; ');
      }
      return body.message ?? text;
    } catch {
      return text;
    }
  }
}

export * from './types.js';
