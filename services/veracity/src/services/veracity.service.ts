import { Inject, Injectable, Logger } from "@nestjs/common";

import type { VeracityCache } from "../cache/veracity.cache.js";
import type { AppConfig } from "../config.js";
import { packagesFromLockfile } from "../lockfile.js";
import { uniquePackages } from "../purl.js";
import { APP_CONFIG, VERACITY_CACHE } from "../tokens.js";
import type { AnalysisResults, PackageIdentity, VeracityChecks } from "../types.js";
import { buildResults } from "../veracity.js";
import { EvaluationCoordinator } from "./evaluation.coordinator.js";
import { VeracityAnalyser } from "./veracity.analyser.js";

@Injectable()
export class VeracityService {
  private readonly logger = new Logger(VeracityService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(VERACITY_CACHE) private readonly cache: VeracityCache,
    @Inject(VeracityAnalyser) private readonly analyser: VeracityAnalyser,
  ) {}

  async check(identity: PackageIdentity): Promise<VeracityChecks> {
    return this.analyser.analyse(identity);
  }

  async analyse(identities: readonly PackageIdentity[]): Promise<AnalysisResults> {
    const batch = uniquePackages(identities);
    if (batch.length === 0) {
      return buildResults([]);
    }
    const coordinator = new EvaluationCoordinator(this.analyser, {
      batchSize: batch.length,
      packageTimeBudgetMs: this.config.evaluation.packageTimeBudgetMs,
    });
    this.logger.log(`Evaluating ${batch.length} packages within ${coordinator.deadlineMs}ms`);
    for (const identity of batch) {
      coordinator.dispatch(identity);
    }
    return coordinator.aggregate();
  }

  async analyseLockfile(content: string): Promise<AnalysisResults> {
    return this.analyse(packagesFromLockfile(content));
  }

  async clearCache(): Promise<void> {
    await this.cache.clear();
  }
}
