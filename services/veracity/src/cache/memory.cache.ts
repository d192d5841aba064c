import { Injectable } from "@nestjs/common";

import { toPackageUrl } from "../purl.js";
import type { PackageIdentity, VeracityChecks } from "../types.js";
import type { VeracityCache } from "./veracity.cache.js";

@Injectable()
export class InMemoryVeracityCache implements VeracityCache {
  private readonly store = new Map<string, VeracityChecks>();

  async get(identity: PackageIdentity): Promise<VeracityChecks | undefined> {
    const value = this.store.get(toPackageUrl(identity));
    return value ? { ...value } : undefined;
  }

  async put(identity: PackageIdentity, checks: VeracityChecks): Promise<void> {
    this.store.set(toPackageUrl(identity), { ...checks });
  }

  async clear(): Promise<void> {
    this.store.clear();
  }

  get size(): number {
    return this.store.size;
  }
}
