import { Injectable, Logger } from "@nestjs/common";
import type { OnModuleDestroy } from "@nestjs/common";
import { Pool } from "pg";

import { toPackageUrl } from "../purl.js";
import type { PackageIdentity, VeracityChecks } from "../types.js";
import { CacheError } from "./veracity.cache.js";
import type { VeracityCache } from "./veracity.cache.js";

type ChecksRow = {
  provenance_evidence: string | null;
  reproducibility_evidence: string | null;
};

@Injectable()
export class PostgresVeracityCache implements VeracityCache, OnModuleDestroy {
  private readonly logger = new Logger(PostgresVeracityCache.name);
  private initialized = false;

  constructor(private readonly pool: Pool) {}

  static fromUrl(databaseUrl: string): PostgresVeracityCache {
    return new PostgresVeracityCache(new Pool({ connectionString: databaseUrl }));
  }

  async init(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS veracity_checks (
        name TEXT NOT NULL,
        version TEXT NOT NULL,
        purl TEXT NOT NULL,
        provenance_evidence TEXT,
        reproducibility_evidence TEXT,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        PRIMARY KEY (name, version)
      )
    `);
    this.initialized = true;
    this.logger.log("Postgres veracity cache ready");
  }

  async get(identity: PackageIdentity): Promise<VeracityChecks | undefined> {
    const result = await this.run(() =>
      this.pool.query<ChecksRow>(
        `SELECT provenance_evidence, reproducibility_evidence
         FROM veracity_checks
         WHERE name = $1 AND version = $2`,
        [identity.name, identity.version],
      ),
    );
    const row = result.rows[0];
    if (!row) {
      return undefined;
    }
    const checks: VeracityChecks = {};
    if (row.provenance_evidence) {
      checks.provenanceEvidence = row.provenance_evidence;
    }
    if (row.reproducibility_evidence) {
      checks.reproducibilityEvidence = row.reproducibility_evidence;
    }
    return checks;
  }

  /** Stored evidence survives an upsert that carries none. */
  async put(identity: PackageIdentity, checks: VeracityChecks): Promise<void> {
    await this.run(() =>
      this.pool.query(
        `INSERT INTO veracity_checks (name, version, purl, provenance_evidence, reproducibility_evidence, updated_at)
         VALUES ($1, $2, $3, $4, $5, NOW())
         ON CONFLICT (name, version) DO UPDATE SET
           provenance_evidence = COALESCE(EXCLUDED.provenance_evidence, veracity_checks.provenance_evidence),
           reproducibility_evidence = COALESCE(EXCLUDED.reproducibility_evidence, veracity_checks.reproducibility_evidence),
           updated_at = EXCLUDED.updated_at`,
        [
          identity.name,
          identity.version,
          toPackageUrl(identity),
          checks.provenanceEvidence ?? null,
          checks.reproducibilityEvidence ?? null,
        ],
      ),
    );
  }

  async clear(): Promise<void> {
    await this.run(() => this.pool.query("DELETE FROM veracity_checks"));
    this.logger.log("Cleared cached checks in Postgres");
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end();
  }

  private async run<T>(query: () => Promise<T>): Promise<T> {
    try {
      await this.init();
      return await query();
    } catch (error) {
      if (error instanceof CacheError) {
        throw error;
      }
      throw new CacheError(`postgres cache failure: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
      });
    }
  }
}
