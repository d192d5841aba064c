import type { AuthorityConfig } from "../config.js";
import type { PackageIdentity } from "../types.js";
import { HttpRequestError } from "./http.client.js";
import type { HttpClient } from "./http.client.js";

export class OssRebuildClient {
  private readonly baseUrl: string;

  constructor(
    private readonly http: HttpClient,
    authority: Pick<AuthorityConfig, "baseUrl">,
  ) {
    this.baseUrl = authority.baseUrl.replace(/\/$/, "");
  }

  attestationUrl(identity: PackageIdentity): string {
    const { name, version } = identity;
    return `${this.baseUrl}/${name}/${version}/${name}-${version}.crate/rebuild.intoto.jsonl`;
  }

  /** 200 means a rebuild attestation exists, 404 means none was published. */
  async hasAttestation(identity: PackageIdentity): Promise<boolean> {
    const url = this.attestationUrl(identity);
    const status = await this.http.head(url);
    if (status === 200) {
      return true;
    }
    if (status === 404) {
      return false;
    }
    throw new HttpRequestError(`cannot fetch information from oss-rebuild (HTTP status = ${status})`, url, status);
  }
}
