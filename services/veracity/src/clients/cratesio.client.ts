import { z } from "zod";

import type { AuthorityConfig } from "../config.js";
import { packageIdentity } from "../purl.js";
import type { PackageIdentity } from "../types.js";
import type { HttpClient } from "./http.client.js";

const MAX_PAGE_SIZE = 100;

const versionDetailsSchema = z.object({
  version: z.object({
    num: z.string().optional(),
    trustpub_data: z
      .object({
        provider: z.string(),
        repository: z.string(),
        run_id: z.coerce.string(),
      })
      .nullable()
      .optional(),
  }),
});

const crateListingSchema = z.object({
  crates: z.array(
    z.object({
      name: z.string(),
      max_version: z.string(),
      max_stable_version: z.string().nullable().optional(),
    }),
  ),
});

export interface TrustedPublishingData {
  provider: string;
  repository: string;
  runId: string;
}

export interface CrateVersionDetails {
  trustedPublishing?: TrustedPublishingData;
}

export class CratesIoClient {
  private readonly baseUrl: string;

  constructor(
    private readonly http: HttpClient,
    authority: Pick<AuthorityConfig, "baseUrl">,
  ) {
    this.baseUrl = authority.baseUrl.replace(/\/$/, "");
  }

  async getVersionDetails(identity: PackageIdentity): Promise<CrateVersionDetails> {
    const name = encodeURIComponent(identity.name);
    const version = encodeURIComponent(identity.version);
    const body = await this.http.getJson(`${this.baseUrl}/api/v1/crates/${name}/${version}`, versionDetailsSchema);
    const trustpub = body.version.trustpub_data;
    if (!trustpub) {
      return {};
    }
    return {
      trustedPublishing: {
        provider: trustpub.provider,
        repository: trustpub.repository,
        runId: trustpub.run_id,
      },
    };
  }

  /** Latest stable version of the `count` most downloaded crates. */
  async getMostDownloaded(count: number): Promise<PackageIdentity[]> {
    const packages: PackageIdentity[] = [];
    const perPage = Math.min(MAX_PAGE_SIZE, count);
    for (let page = 1; packages.length < count; page += 1) {
      const body = await this.http.getJson(
        `${this.baseUrl}/api/v1/crates?page=${page}&per_page=${perPage}&sort=downloads`,
        crateListingSchema,
      );
      for (const entry of body.crates) {
        packages.push(packageIdentity(entry.name, entry.max_stable_version ?? entry.max_version));
      }
      if (body.crates.length < perPage) {
        break;
      }
    }
    return packages.slice(0, count);
  }
}
