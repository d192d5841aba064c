import { Logger } from "@nestjs/common";

import { toPackageUrl } from "../purl.js";
import type { AnalysisOutcome, AnalysisResults, PackageIdentity, VeracityAnalysis } from "../types.js";
import { buildResults } from "../veracity.js";

export class AggregationTimeoutError extends Error {
  constructor(public readonly deadlineMs: number, public readonly completed: number, public readonly expected: number) {
    super(`evaluation did not complete within ${deadlineMs}ms (${completed}/${expected} packages done)`);
    this.name = "AggregationTimeoutError";
  }
}

export interface CoordinatorOptions {
  batchSize: number;
  packageTimeBudgetMs: number;
}

/**
 * Fans package evaluations out concurrently and gathers their outcomes.
 * One instance per batch: after `aggregate()` it accepts nothing more.
 */
export class EvaluationCoordinator {
  private readonly logger = new Logger(EvaluationCoordinator.name);
  private readonly outcomes: AnalysisOutcome[] = [];
  private readonly pending: Promise<void>[] = [];
  private finished = false;

  constructor(
    private readonly analyser: VeracityAnalysis,
    private readonly options: CoordinatorOptions,
  ) {}

  get deadlineMs(): number {
    return this.options.packageTimeBudgetMs * 2 * this.options.batchSize;
  }

  dispatch(identity: PackageIdentity): void {
    if (this.finished) {
      throw new Error("coordinator already aggregated its batch");
    }
    const unit = this.analyser.analyse(identity).then(
      (checks) => {
        this.outcomes.push({ package: identity, checks });
      },
      (error: unknown) => {
        this.logger.error(
          `Failed to evaluate ${toPackageUrl(identity)}: ${error instanceof Error ? error.message : String(error)}`,
        );
        this.outcomes.push({ package: identity });
      },
    );
    this.pending.push(unit);
  }

  async aggregate(): Promise<AnalysisResults> {
    if (this.finished) {
      throw new Error("coordinator already aggregated its batch");
    }
    this.finished = true;

    const expected = this.pending.length;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new AggregationTimeoutError(this.deadlineMs, this.outcomes.length, expected)),
        this.deadlineMs,
      );
    });
    try {
      await Promise.race([Promise.all(this.pending), deadline]);
    } finally {
      clearTimeout(timer);
    }
    return buildResults(this.outcomes);
  }
}
