import nock from "nock";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";

import { HttpClient, HttpRequestError, isRetryable, isTransientStatus } from "../src/clients/http.client.js";
import { RequestPacer } from "../src/clients/pacer.js";
import type { HttpConfig } from "../src/config.js";

const baseUrl = "https://registry.test";
const okSchema = z.object({ ok: z.boolean() });

const httpConfig: HttpConfig = {
  userAgent: "veracity-test/1.0",
  timeoutMs: 2000,
  maxRetries: 2,
  retryBaseDelayMs: 10,
};

function buildClient(overrides: Partial<HttpConfig> = {}, pacer = new RequestPacer(0)) {
  const wait = vi.fn(async (_ms: number) => {});
  return { client: new HttpClient({ ...httpConfig, ...overrides }, pacer, wait), wait };
}

beforeEach(() => {
  nock.disableNetConnect();
});

afterEach(() => {
  nock.abortPendingRequests();
  nock.cleanAll();
  nock.enableNetConnect();
});

describe("HttpClient", () => {
  it("identifies itself to the upstream", async () => {
    const scope = nock(baseUrl)
      .matchHeader("user-agent", "veracity-test/1.0")
      .get("/ping")
      .reply(200, { ok: true });
    const { client } = buildClient();

    await expect(client.getJson(`${baseUrl}/ping`, okSchema)).resolves.toEqual({ ok: true });
    expect(scope.isDone()).toBe(true);
  });

  it("retries transient statuses with exponential backoff", async () => {
    const scope = nock(baseUrl)
      .get("/flaky")
      .reply(503, "unavailable")
      .get("/flaky")
      .reply(429)
      .get("/flaky")
      .reply(200, { ok: true });
    const { client, wait } = buildClient();

    await expect(client.getJson(`${baseUrl}/flaky`, okSchema)).resolves.toEqual({ ok: true });
    expect(wait.mock.calls).toEqual([[10], [20]]);
    expect(scope.isDone()).toBe(true);
  });

  it("gives up after the configured retries with the last status", async () => {
    const scope = nock(baseUrl).get("/down").times(3).reply(502);
    const { client } = buildClient();

    const failure = await client.getJson(`${baseUrl}/down`, okSchema).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(HttpRequestError);
    expect(failure).toMatchObject({ status: 502, url: `${baseUrl}/down` });
    expect(scope.isDone()).toBe(true);
  });

  it("retries transport errors", async () => {
    const scope = nock(baseUrl)
      .get("/reset")
      .replyWithError("socket hang up")
      .get("/reset")
      .reply(200, { ok: true });
    const { client, wait } = buildClient();

    await expect(client.getJson(`${baseUrl}/reset`, okSchema)).resolves.toEqual({ ok: true });
    expect(wait).toHaveBeenCalledTimes(1);
    expect(scope.isDone()).toBe(true);
  });

  it("returns client errors of HEAD requests without retrying", async () => {
    const scope = nock(baseUrl).head("/missing").reply(404);
    const { client, wait } = buildClient();

    await expect(client.head(`${baseUrl}/missing`)).resolves.toBe(404);
    expect(wait).not.toHaveBeenCalled();
    expect(scope.isDone()).toBe(true);
  });

  it("paces once per logical request", async () => {
    nock(baseUrl).get("/paced").reply(500).get("/paced").reply(200, { ok: true });
    const pacer = new RequestPacer(0);
    const pace = vi.spyOn(pacer, "pace");
    const { client } = buildClient({}, pacer);

    await client.getJson(`${baseUrl}/paced`, okSchema);

    expect(pace).toHaveBeenCalledTimes(1);
  });

  it("validates JSON payloads", async () => {
    nock(baseUrl).get("/crate").reply(200, { crate: { id: 42 } });
    const { client } = buildClient();

    await expect(client.getJson(`${baseUrl}/crate`, z.object({ crate: z.object({ id: z.string() }) }))).rejects.toThrow(
      /unexpected payload from https:\/\/registry\.test\/crate/,
    );
  });

  it("reports malformed JSON as an upstream failure without retrying", async () => {
    const scope = nock(baseUrl)
      .get("/broken")
      .reply(200, "{ not json", { "Content-Type": "application/json" });
    const { client, wait } = buildClient();

    const failure = await client.getJson(`${baseUrl}/broken`, okSchema).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(HttpRequestError);
    expect(failure).toMatchObject({ status: 200 });
    expect(String(failure)).toMatch(/malformed JSON from https:\/\/registry\.test\/broken/);
    expect(wait).not.toHaveBeenCalled();
    expect(scope.isDone()).toBe(true);
  });

  it("rejects JSON requests answered with an error status", async () => {
    nock(baseUrl).get("/gone").reply(410, "gone");
    const { client, wait } = buildClient();

    await expect(client.getJson(`${baseUrl}/gone`, okSchema)).rejects.toThrow(
      "GET https://registry.test/gone failed with status 410",
    );
    expect(wait).not.toHaveBeenCalled();
  });

  it("times out when the headers are late", async () => {
    nock(baseUrl).get("/slow").delay(1000).reply(200, { ok: true });
    const { client } = buildClient({ timeoutMs: 50, maxRetries: 0 });

    await expect(client.getJson(`${baseUrl}/slow`, okSchema)).rejects.toThrow(
      "GET https://registry.test/slow timed out after 50ms",
    );
  });

  it("times out when the body stalls after the headers", async () => {
    nock(baseUrl).get("/stalled").delayBody(1000).reply(200, { ok: true });
    const { client } = buildClient({ timeoutMs: 50, maxRetries: 0 });

    const failure = await client.getJson(`${baseUrl}/stalled`, okSchema).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(HttpRequestError);
    expect(failure).toMatchObject({
      message: "GET https://registry.test/stalled timed out after 50ms",
      status: undefined,
    });
  });

  it("retries an attempt that timed out", async () => {
    const scope = nock(baseUrl)
      .get("/sometimes-slow")
      .delayBody(1000)
      .reply(200, { ok: false })
      .get("/sometimes-slow")
      .reply(200, { ok: true });
    const { client, wait } = buildClient({ timeoutMs: 50 });

    await expect(client.getJson(`${baseUrl}/sometimes-slow`, okSchema)).resolves.toEqual({ ok: true });
    expect(wait.mock.calls).toEqual([[10]]);
    expect(scope.isDone()).toBe(true);
  });
});

describe("retry classification", () => {
  it("treats throttling and server errors as transient", () => {
    expect([200, 404, 429, 500, 503].map(isTransientStatus)).toEqual([false, false, true, true, true]);
  });

  it("retries failures without a status", () => {
    expect(isRetryable(new HttpRequestError("timed out", baseUrl))).toBe(true);
    expect(isRetryable(new HttpRequestError("bad payload", baseUrl, 200))).toBe(false);
    expect(isRetryable(new HttpRequestError("throttled", baseUrl, 429))).toBe(true);
  });
});
