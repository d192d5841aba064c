import { Logger } from "@nestjs/common";

import type { CratesIoClient, TrustedPublishingData } from "../clients/cratesio.client.js";
import { toPackageUrl } from "../purl.js";
import type { FactorChecker, PackageIdentity } from "../types.js";

export function provenanceEvidenceUrl(identity: PackageIdentity, data: TrustedPublishingData): string {
  if (data.provider === "github") {
    return `https://github.com/${data.repository}/actions/runs/${encodeURIComponent(data.runId)}`;
  }
  return `https://crates.io/crates/${identity.name}/${identity.version}`;
}

/** Trusted publishing metadata recorded by crates.io for a version. */
export class CratesIoProvenanceChecker implements FactorChecker {
  private readonly logger = new Logger(CratesIoProvenanceChecker.name);

  constructor(private readonly client: CratesIoClient) {}

  async check(identity: PackageIdentity): Promise<string | undefined> {
    const details = await this.client.getVersionDetails(identity);
    if (!details.trustedPublishing) {
      this.logger.log(`provenance not found for ${toPackageUrl(identity)}`);
      return undefined;
    }
    const { provider, repository, runId } = details.trustedPublishing;
    this.logger.log(
      `found provenance for ${toPackageUrl(identity)} (provider = ${provider} | repo = ${repository} | run_id = ${runId})`,
    );
    return provenanceEvidenceUrl(identity, details.trustedPublishing);
  }
}
