import { z } from "zod";

import { toPackageUrl } from "../purl.js";
import type { PackageIdentity, VeracityChecks } from "../types.js";
import { CacheError } from "./veracity.cache.js";

export const CHECKS_FILE_NAME = "checks.json";

const checksDocumentSchema = z.object({
  package: z.string(),
  provenanceEvidence: z.string().nullable(),
  reproducibilityEvidence: z.string().nullable(),
});

export type ChecksDocument = z.infer<typeof checksDocumentSchema>;

export function toChecksDocument(identity: PackageIdentity, checks: VeracityChecks): ChecksDocument {
  return {
    package: toPackageUrl(identity),
    provenanceEvidence: checks.provenanceEvidence ?? null,
    reproducibilityEvidence: checks.reproducibilityEvidence ?? null,
  };
}

export function serializeChecks(identity: PackageIdentity, checks: VeracityChecks): string {
  return `${JSON.stringify(toChecksDocument(identity, checks), null, 2)}\n`;
}

export function parseChecks(raw: string, location: string): VeracityChecks {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new CacheError(`malformed cache entry at ${location}`, { cause: error });
  }
  const parsed = checksDocumentSchema.safeParse(json);
  if (!parsed.success) {
    throw new CacheError(`invalid cache entry at ${location}: ${parsed.error.message}`);
  }
  const checks: VeracityChecks = {};
  if (parsed.data.provenanceEvidence) {
    checks.provenanceEvidence = parsed.data.provenanceEvidence;
  }
  if (parsed.data.reproducibilityEvidence) {
    checks.reproducibilityEvidence = parsed.data.reproducibilityEvidence;
  }
  return checks;
}

/** Rejects segments that would escape the package's own directory. */
export function safeSegment(segment: string): string {
  if (segment === "" || segment === "." || segment === ".." || /[/\\]/.test(segment)) {
    throw new CacheError(`refusing unsafe cache path segment "${segment}"`);
  }
  return segment;
}
