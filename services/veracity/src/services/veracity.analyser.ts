import { Inject, Injectable, Logger } from "@nestjs/common";

import type { VeracityCache } from "../cache/veracity.cache.js";
import { toPackageUrl } from "../purl.js";
import { PROVENANCE_CHECKER, REPRODUCIBILITY_CHECKER, VERACITY_CACHE } from "../tokens.js";
import type { FactorChecker, PackageIdentity, VeracityAnalysis, VeracityChecks } from "../types.js";
import { levelOf } from "../veracity.js";

/**
 * Cache-aware evaluation of a single package.
 *
 * Entries still missing reproducible builds are re-checked on every call.
 * Provenance is only looked up on a cache miss.
 */
@Injectable()
export class VeracityAnalyser implements VeracityAnalysis {
  private readonly logger = new Logger(VeracityAnalyser.name);

  constructor(
    @Inject(VERACITY_CACHE) private readonly cache: VeracityCache,
    @Inject(PROVENANCE_CHECKER) private readonly provenance: FactorChecker,
    @Inject(REPRODUCIBILITY_CHECKER) private readonly reproducibility: FactorChecker,
  ) {}

  async analyse(identity: PackageIdentity): Promise<VeracityChecks> {
    const cached = await this.cache.get(identity);
    if (!cached) {
      return this.evaluate(identity);
    }

    const level = levelOf(cached);
    if (level.kind === "two-factors" || (level.kind === "single-factor" && level.factor === "reproducible-builds")) {
      return cached;
    }
    return this.recheckReproducibility(identity, cached);
  }

  private async evaluate(identity: PackageIdentity): Promise<VeracityChecks> {
    const [provenanceEvidence, reproducibilityEvidence] = await Promise.all([
      this.provenance.check(identity),
      this.reproducibility.check(identity),
    ]);
    const checks: VeracityChecks = {};
    if (provenanceEvidence) {
      checks.provenanceEvidence = provenanceEvidence;
    }
    if (reproducibilityEvidence) {
      checks.reproducibilityEvidence = reproducibilityEvidence;
    }
    await this.cache.put(identity, checks);
    return checks;
  }

  private async recheckReproducibility(identity: PackageIdentity, cached: VeracityChecks): Promise<VeracityChecks> {
    let reproducibilityEvidence: string | undefined;
    try {
      reproducibilityEvidence = await this.reproducibility.check(identity);
    } catch (error) {
      this.logger.warn(
        `Reproducibility re-check failed for ${toPackageUrl(identity)}, using cached checks: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      return cached;
    }
    if (!reproducibilityEvidence) {
      return cached;
    }
    const updated: VeracityChecks = { ...cached, reproducibilityEvidence };
    await this.cache.put(identity, updated);
    return updated;
  }
}
