import { parse } from "smol-toml";
import { z } from "zod";

import { packageIdentity } from "./purl.js";
import type { PackageIdentity } from "./types.js";

export const CRATES_IO_INDEX_SOURCES = [
  "registry+https://github.com/rust-lang/crates.io-index",
  "sparse+https://index.crates.io/",
] as const;

const lockfileSchema = z.object({
  version: z.number().int().optional(),
  package: z
    .array(
      z.object({
        name: z.string(),
        version: z.string(),
        source: z.string().optional(),
      }),
    )
    .default([]),
});

export class InvalidLockfileError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InvalidLockfileError";
  }
}

function fromCratesIo(source: string | undefined): boolean {
  return source !== undefined && CRATES_IO_INDEX_SOURCES.some((index) => source === index);
}

/**
 * Packages resolved from the crates.io index. Path, git and alternative
 * registry dependencies are skipped since no authority publishes evidence
 * for them.
 */
export function packagesFromLockfile(content: string): PackageIdentity[] {
  let document: unknown;
  try {
    document = parse(content);
  } catch (error) {
    throw new InvalidLockfileError(
      `cannot parse Cargo.lock: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
  const parsed = lockfileSchema.safeParse(document);
  if (!parsed.success) {
    throw new InvalidLockfileError(`unexpected Cargo.lock layout: ${parsed.error.message}`);
  }
  return parsed.data.package
    .filter((entry) => fromCratesIo(entry.source))
    .map((entry) => packageIdentity(entry.name, entry.version));
}
