import { Logger } from "@nestjs/common";

import type { OssRebuildClient } from "../clients/ossrebuild.client.js";
import { toPackageUrl } from "../purl.js";
import type { FactorChecker, PackageIdentity } from "../types.js";

export class OssRebuildReproducibilityChecker implements FactorChecker {
  private readonly logger = new Logger(OssRebuildReproducibilityChecker.name);

  constructor(private readonly client: OssRebuildClient) {}

  async check(identity: PackageIdentity): Promise<string | undefined> {
    if (!(await this.client.hasAttestation(identity))) {
      this.logger.log(`reproduced build not found for ${toPackageUrl(identity)}`);
      return undefined;
    }
    this.logger.log(`found reproduced build for ${toPackageUrl(identity)}`);
    return this.client.attestationUrl(identity);
  }
}
