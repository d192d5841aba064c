import { Module } from "@nestjs/common";

import { FilesystemVeracityCache } from "./cache/filesystem.cache.js";
import { PostgresVeracityCache } from "./cache/postgres.cache.js";
import { S3VeracityCache } from "./cache/s3.cache.js";
import { CratesIoProvenanceChecker } from "./checkers/provenance.checker.js";
import { OssRebuildReproducibilityChecker } from "./checkers/reproducibility.checker.js";
import { CratesIoClient } from "./clients/cratesio.client.js";
import { HttpClient } from "./clients/http.client.js";
import { OssRebuildClient } from "./clients/ossrebuild.client.js";
import { RequestPacer } from "./clients/pacer.js";
import { loadConfig } from "./config.js";
import type { AppConfig, AuthorityConfig } from "./config.js";
import { AnalyseController } from "./controllers/analyse.controller.js";
import { CacheController } from "./controllers/cache.controller.js";
import { CheckController } from "./controllers/check.controller.js";
import { HealthController } from "./controllers/health.controller.js";
import { InquireController } from "./controllers/inquire.controller.js";
import { EcosystemInquirer } from "./services/ecosystem.inquirer.js";
import { VeracityAnalyser } from "./services/veracity.analyser.js";
import { VeracityService } from "./services/veracity.service.js";
import { APP_CONFIG, PROVENANCE_CHECKER, REPRODUCIBILITY_CHECKER, VERACITY_CACHE } from "./tokens.js";

function pacedHttpClient(config: AppConfig, authority: AuthorityConfig): HttpClient {
  return new HttpClient(config.http, new RequestPacer(authority.pacingMs));
}

const configProvider = {
  provide: APP_CONFIG,
  useFactory: () => loadConfig(),
};

const cacheProvider = {
  provide: VERACITY_CACHE,
  inject: [APP_CONFIG],
  useFactory: async (config: AppConfig) => {
    if (config.database.url) {
      const cache = PostgresVeracityCache.fromUrl(config.database.url);
      await cache.init();
      return cache;
    }
    if (config.objectStorage.bucket) {
      return new S3VeracityCache(config.objectStorage);
    }
    return new FilesystemVeracityCache(config.cache.directory);
  },
};

const cratesIoProvider = {
  provide: CratesIoClient,
  inject: [APP_CONFIG],
  useFactory: (config: AppConfig) =>
    new CratesIoClient(pacedHttpClient(config, config.authorities.cratesIo), config.authorities.cratesIo),
};

const ossRebuildProvider = {
  provide: OssRebuildClient,
  inject: [APP_CONFIG],
  useFactory: (config: AppConfig) =>
    new OssRebuildClient(pacedHttpClient(config, config.authorities.ossRebuild), config.authorities.ossRebuild),
};

const provenanceCheckerProvider = {
  provide: PROVENANCE_CHECKER,
  inject: [CratesIoClient],
  useFactory: (client: CratesIoClient) => new CratesIoProvenanceChecker(client),
};

const reproducibilityCheckerProvider = {
  provide: REPRODUCIBILITY_CHECKER,
  inject: [OssRebuildClient],
  useFactory: (client: OssRebuildClient) => new OssRebuildReproducibilityChecker(client),
};

@Module({
  imports: [],
  controllers: [CheckController, AnalyseController, InquireController, CacheController, HealthController],
  providers: [
    configProvider,
    cacheProvider,
    cratesIoProvider,
    ossRebuildProvider,
    provenanceCheckerProvider,
    reproducibilityCheckerProvider,
    VeracityAnalyser,
    VeracityService,
    EcosystemInquirer,
  ],
})
export class AppModule {}
