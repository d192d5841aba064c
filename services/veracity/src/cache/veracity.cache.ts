import type { PackageIdentity, VeracityChecks } from "../types.js";

export class CacheError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CacheError";
  }
}

export interface VeracityCache {
  /** Resolves `undefined` when nothing was stored for the package. */
  get(identity: PackageIdentity): Promise<VeracityChecks | undefined>;
  put(identity: PackageIdentity, checks: VeracityChecks): Promise<void>;
  clear(): Promise<void>;
}
