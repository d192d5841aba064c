import type { AnalyseResponse, CheckResponse, InquireCoverage, InquireResponse } from './types.js';

export interface VeracityClientOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
  headers?: Record<string, string>;
}

export class VeracityApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message);
    this.name = 'VeracityApiError';
  }
}

export class VeracityClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: VeracityClientOptions) {
    if (!options.baseUrl) {
      throw new Error('baseUrl is required');
    }
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.defaultHeaders = options.headers ?? {};
  }

  /** `purl` is a cargo package url such as `pkg:cargo/serde@1.0.228`. */
  async check(purl: string): Promise<CheckResponse> {
    const response = await this.fetchImpl(`${this.baseUrl}/check?purl=${encodeURIComponent(purl)}`, {
      method: 'GET',
      headers: this.defaultHeaders,
    });
    return this.readJson<CheckResponse>(response, 'Check');
  }

  async analyse(packages: string[]): Promise<AnalyseResponse> {
    if (packages.length === 0) {
      throw new Error('at least one package is required');
    }
    const response = await this.fetchImpl(`${this.baseUrl}/analyse`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...this.defaultHeaders,
      },
      body: JSON.stringify({ packages }),
    });
    return this.readJson<AnalyseResponse>(response, 'Analyse');
  }

  async analyseLockfile(lockfile: string): Promise<AnalyseResponse> {
    const form = new FormData();
    form.append('lockfile', new Blob([lockfile], { type: 'text/plain' }), 'Cargo.lock');
    const response = await this.fetchImpl(`${this.baseUrl}/analyse/lockfile`, {
      method: 'POST',
      headers: this.defaultHeaders,
      body: form,
    });
    return this.readJson<AnalyseResponse>(response, 'Lockfile analysis');
  }

  async inquire(coverage: InquireCoverage = 'small'): Promise<InquireResponse> {
    const response = await this.fetchImpl(`${this.baseUrl}/inquire?coverage=${coverage}`, {
      method: 'GET',
      headers: this.defaultHeaders,
    });
    return this.readJson<InquireResponse>(response, 'Inquire');
  }

  async clearCache(): Promise<void> {
    const response = await this.fetchImpl(`${this.baseUrl}/cache`, {
      method: 'DELETE',
      headers: this.defaultHeaders,
    });
    if (!response.ok) {
      const body = await this.readErrorBody(response);
      throw new VeracityApiError(`Cache cleanup failed with ${response.status}: ${body}`, response.status);
    }
  }

  private async readJson<T>(response: Response, operation: string): Promise<T> {
    if (!response.ok) {
      const body = await this.readErrorBody(response);
      throw new VeracityApiError(`${operation} request failed with ${response.status}: ${body}`, response.status);
    }
    return (await response.json()) as T;
  }

  private async readErrorBody(response: Response): Promise<string> {
    try {
      const text = await response.text();
      return text || '<empty>';
    } catch (err) {
      return `<failed to read error body: ${String(err)}>`;
    }
  }
}

export * from './types.js';
