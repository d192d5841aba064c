import { Inject, Injectable, Logger } from "@nestjs/common";

import { CratesIoClient } from "../clients/cratesio.client.js";
import type { EcosystemInquiringResults, InquireCoverage } from "../types.js";
import { percentage } from "../veracity.js";
import { VeracityService } from "./veracity.service.js";

export const COVERAGE_SIZES: Readonly<Record<InquireCoverage, number>> = {
  small: 100,
  medium: 250,
  large: 500,
  huge: 1000,
};

/** Samples the most downloaded crates and reports how common each factor is. */
@Injectable()
export class EcosystemInquirer {
  private readonly logger = new Logger(EcosystemInquirer.name);

  constructor(
    @Inject(CratesIoClient) private readonly cratesIo: CratesIoClient,
    @Inject(VeracityService) private readonly veracity: VeracityService,
  ) {}

  async inquire(coverage: InquireCoverage): Promise<EcosystemInquiringResults> {
    const sample = await this.cratesIo.getMostDownloaded(COVERAGE_SIZES[coverage]);
    this.logger.log(`Inquiring ${sample.length} crates (coverage = ${coverage})`);

    const { statistics, outcomes } = await this.veracity.analyse(sample);
    return {
      coverage,
      totalCratesInquired: statistics.total,
      totalCratesWithProvenance: statistics.provenanceAttested,
      totalCratesWithReproducibility: statistics.reproducibleBuilds,
      presenceOfProvenance: percentage(statistics.provenanceAttested, statistics.total),
      presenceOfReproducibility: percentage(statistics.reproducibleBuilds, statistics.total),
      outcomes,
    };
  }
}
