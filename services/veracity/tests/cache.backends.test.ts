import "reflect-metadata";

import { DeleteObjectsCommand, GetObjectCommand, ListObjectsV2Command, PutObjectCommand } from "@aws-sdk/client-s3";
import type { S3Client } from "@aws-sdk/client-s3";
import type { Pool } from "pg";
import { describe, expect, it, vi } from "vitest";

import { InMemoryVeracityCache } from "../src/cache/memory.cache.js";
import { PostgresVeracityCache } from "../src/cache/postgres.cache.js";
import { S3VeracityCache } from "../src/cache/s3.cache.js";
import { CacheError } from "../src/cache/veracity.cache.js";
import { packageIdentity } from "../src/purl.js";

const serde = packageIdentity("serde", "1.0.228");
const rand = packageIdentity("rand", "0.9.2");

describe("InMemoryVeracityCache", () => {
  it("stores copies of the checks", async () => {
    const cache = new InMemoryVeracityCache();
    const checks = { provenanceEvidence: "https://p.test" };
    await cache.put(serde, checks);
    checks.provenanceEvidence = "https://changed.test";

    await expect(cache.get(serde)).resolves.toEqual({ provenanceEvidence: "https://p.test" });
    await expect(cache.get(rand)).resolves.toBeUndefined();

    await cache.clear();
    expect(cache.size).toBe(0);
  });
});

class FakeS3 {
  readonly objects = new Map<string, string>();

  send = vi.fn(async (command: unknown): Promise<unknown> => {
    if (command instanceof PutObjectCommand) {
      this.objects.set(`${command.input.Bucket}/${command.input.Key}`, String(command.input.Body));
      return {};
    }
    if (command instanceof GetObjectCommand) {
      const body = this.objects.get(`${command.input.Bucket}/${command.input.Key}`);
      if (body === undefined) {
        throw Object.assign(new Error("The specified key does not exist."), { name: "NoSuchKey" });
      }
      return { Body: { transformToString: async () => body } };
    }
    if (command instanceof ListObjectsV2Command) {
      const prefix = `${command.input.Bucket}/${command.input.Prefix ?? ""}`;
      const keys = [...this.objects.keys()]
        .filter((key) => key.startsWith(prefix))
        .map((key) => key.slice(`${command.input.Bucket}/`.length));
      return { Contents: keys.map((Key) => ({ Key })), IsTruncated: false };
    }
    if (command instanceof DeleteObjectsCommand) {
      for (const object of command.input.Delete?.Objects ?? []) {
        this.objects.delete(`${command.input.Bucket}/${object.Key}`);
      }
      return {};
    }
    throw new Error("unexpected command");
  });
}

describe("S3VeracityCache", () => {
  function build() {
    const fake = new FakeS3();
    const cache = new S3VeracityCache({ bucket: "checks", prefix: "cargo/" }, fake as unknown as S3Client);
    return { fake, cache };
  }

  it("stores the JSON document under the package key", async () => {
    const { fake, cache } = build();

    await cache.put(serde, { reproducibilityEvidence: "https://rebuild.test/serde" });

    expect(JSON.parse(fake.objects.get("checks/cargo/serde/1.0.228/checks.json") ?? "")).toEqual({
      package: "pkg:cargo/serde@1.0.228",
      provenanceEvidence: null,
      reproducibilityEvidence: "https://rebuild.test/serde",
    });
    await expect(cache.get(serde)).resolves.toEqual({ reproducibilityEvidence: "https://rebuild.test/serde" });
  });

  it("treats a missing key as a miss", async () => {
    const { cache } = build();

    await expect(cache.get(rand)).resolves.toBeUndefined();
  });

  it("wraps storage failures", async () => {
    const { fake, cache } = build();
    fake.send.mockRejectedValueOnce(new Error("AccessDenied"));

    await expect(cache.get(serde)).rejects.toBeInstanceOf(CacheError);
  });

  it("deletes every cached document under the prefix", async () => {
    const { fake, cache } = build();
    await cache.put(serde, {});
    await cache.put(rand, {});
    fake.objects.set("checks/unrelated.txt", "keep");

    await cache.clear();

    expect([...fake.objects.keys()]).toEqual(["checks/unrelated.txt"]);
  });

  it("requires a bucket", () => {
    expect(() => new S3VeracityCache({}, new FakeS3() as unknown as S3Client)).toThrow("S3 bucket must be configured");
  });
});

describe("PostgresVeracityCache", () => {
  function build(rows: unknown[] = []) {
    const query = vi.fn(async (_sql: string, _params?: unknown[]) => ({ rows, rowCount: rows.length }));
    const end = vi.fn(async () => {});
    const cache = new PostgresVeracityCache({ query, end } as unknown as Pool);
    return { cache, query, end };
  }

  it("creates the table once", async () => {
    const { cache, query } = build();

    await cache.get(serde);
    await cache.get(rand);

    const creates = query.mock.calls.filter(([sql]) => sql.includes("CREATE TABLE IF NOT EXISTS veracity_checks"));
    expect(creates).toHaveLength(1);
  });

  it("maps stored rows to checks", async () => {
    const { cache, query } = build([{ provenance_evidence: "https://p.test", reproducibility_evidence: null }]);

    await expect(cache.get(serde)).resolves.toEqual({ provenanceEvidence: "https://p.test" });
    expect(query).toHaveBeenLastCalledWith(expect.stringContaining("WHERE name = $1 AND version = $2"), [
      "serde",
      "1.0.228",
    ]);
  });

  it("misses when no row matches", async () => {
    const { cache } = build();

    await expect(cache.get(serde)).resolves.toBeUndefined();
  });

  it("upserts without clearing stored evidence", async () => {
    const { cache, query } = build();

    await cache.put(serde, { reproducibilityEvidence: "https://rebuild.test/serde" });

    const [sql, params] = query.mock.calls[query.mock.calls.length - 1];
    expect(sql).toContain(
      "provenance_evidence = COALESCE(EXCLUDED.provenance_evidence, veracity_checks.provenance_evidence)",
    );
    expect(params).toEqual(["serde", "1.0.228", "pkg:cargo/serde@1.0.228", null, "https://rebuild.test/serde"]);
  });

  it("wraps query failures", async () => {
    const { cache, query } = build();
    query.mockRejectedValueOnce(new Error("connection refused"));

    await expect(cache.clear()).rejects.toThrow("postgres cache failure: connection refused");
  });

  it("closes the pool on shutdown", async () => {
    const { cache, end } = build();

    await cache.onModuleDestroy();

    expect(end).toHaveBeenCalledTimes(1);
  });
});
