import { Logger } from "@nestjs/common";
import fetch from "node-fetch";
import type { Response } from "node-fetch";
import type { z } from "zod";

import type { HttpConfig } from "../config.js";
import { RequestPacer, sleep } from "./pacer.js";
import type { WaitFn } from "./pacer.js";

type Method = "GET" | "HEAD";
type ResponseReader<T> = (response: Response) => Promise<T>;

export class HttpRequestError extends Error {
  public readonly url: string;
  public readonly status?: number;

  constructor(message: string, url: string, status?: number) {
    super(message);
    this.name = "HttpRequestError";
    this.url = url;
    this.status = status;
  }
}

export function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/** Transport failures and timeouts carry no status and are retried too. */
export function isRetryable(error: HttpRequestError): boolean {
  return error.status === undefined || isTransientStatus(error.status);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function discardBody(response: Response): Promise<void> {
  await response.arrayBuffer().catch(() => undefined);
}

/**
 * node-fetch wrapper shared by the upstream clients. Each logical request is
 * paced once; transient failures are retried with exponential backoff. The
 * timeout of an attempt covers reading the body.
 */
export class HttpClient {
  private readonly logger = new Logger(HttpClient.name);

  constructor(
    private readonly config: HttpConfig,
    private readonly pacer: RequestPacer = new RequestPacer(0),
    private readonly wait: WaitFn = sleep,
  ) {}

  /** Resolves the status of any answer that is not transient. */
  async head(url: string): Promise<number> {
    return this.send("HEAD", url, async (response) => response.status);
  }

  async getJson<S extends z.ZodTypeAny>(url: string, schema: S): Promise<z.infer<S>> {
    return this.send("GET", url, async (response) => {
      if (!response.ok) {
        await discardBody(response);
        throw new HttpRequestError(`GET ${url} failed with status ${response.status}`, url, response.status);
      }
      const text = await response.text();
      let json: unknown;
      try {
        json = JSON.parse(text);
      } catch (error) {
        throw new HttpRequestError(`malformed JSON from ${url}: ${describe(error)}`, url, response.status);
      }
      const parsed = schema.safeParse(json);
      if (!parsed.success) {
        throw new HttpRequestError(`unexpected payload from ${url}: ${parsed.error.message}`, url, response.status);
      }
      return parsed.data;
    });
  }

  private async send<T>(method: Method, url: string, read: ResponseReader<T>): Promise<T> {
    await this.pacer.pace();

    for (let attempt = 0; ; attempt += 1) {
      let failure: HttpRequestError;
      try {
        return await this.attempt(method, url, read);
      } catch (error) {
        failure = error instanceof HttpRequestError
          ? error
          : new HttpRequestError(`${method} ${url} failed: ${describe(error)}`, url);
      }

      if (!isRetryable(failure) || attempt >= this.config.maxRetries) {
        throw failure;
      }
      const delay = this.config.retryBaseDelayMs * 2 ** attempt;
      this.logger.warn(`${failure.message}; retrying in ${delay}ms (${attempt + 1}/${this.config.maxRetries})`);
      await this.wait(delay);
    }
  }

  private async attempt<T>(method: Method, url: string, read: ResponseReader<T>): Promise<T> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);
    try {
      const response = await fetch(url, {
        method,
        headers: {
          Accept: "application/json",
          "User-Agent": this.config.userAgent,
        },
        signal: controller.signal,
      });
      if (isTransientStatus(response.status)) {
        await discardBody(response);
        throw new HttpRequestError(`${method} ${url} failed with status ${response.status}`, url, response.status);
      }
      return await read(response);
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new HttpRequestError(`${method} ${url} timed out after ${this.config.timeoutMs}ms`, url);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }
}
