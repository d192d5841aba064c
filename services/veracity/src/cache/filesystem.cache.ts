import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { Injectable, Logger } from "@nestjs/common";

import type { PackageIdentity, VeracityChecks } from "../types.js";
import { CHECKS_FILE_NAME, parseChecks, safeSegment, serializeChecks } from "./checks.document.js";
import { CacheError } from "./veracity.cache.js";
import type { VeracityCache } from "./veracity.cache.js";

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** One `checks.json` per package under `<directory>/<name>/<version>/`. */
@Injectable()
export class FilesystemVeracityCache implements VeracityCache {
  private readonly logger = new Logger(FilesystemVeracityCache.name);

  constructor(private readonly directory: string) {}

  async get(identity: PackageIdentity): Promise<VeracityChecks | undefined> {
    const file = this.fileFor(identity);
    let raw: string;
    try {
      raw = await readFile(file, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw new CacheError(`cannot read cache entry at ${file}`, { cause: error });
    }
    return parseChecks(raw, file);
  }

  async put(identity: PackageIdentity, checks: VeracityChecks): Promise<void> {
    const folder = this.folderFor(identity);
    const file = join(folder, CHECKS_FILE_NAME);
    try {
      await mkdir(folder, { recursive: true });
      await writeFile(file, serializeChecks(identity, checks), "utf8");
    } catch (error) {
      throw new CacheError(`cannot write cache entry at ${file}`, { cause: error });
    }
  }

  async clear(): Promise<void> {
    try {
      await rm(this.directory, { recursive: true, force: true });
    } catch (error) {
      throw new CacheError(`cannot clear cache at ${this.directory}`, { cause: error });
    }
    this.logger.log(`Cleared cached checks under ${this.directory}`);
  }

  private folderFor(identity: PackageIdentity): string {
    return join(this.directory, safeSegment(identity.name), safeSegment(identity.version));
  }

  private fileFor(identity: PackageIdentity): string {
    return join(this.folderFor(identity), CHECKS_FILE_NAME);
  }
}
