import { homedir } from "node:os";
import { join } from "node:path";

import { z } from "zod";

export const DEFAULT_CRATES_IO_URL = "https://crates.io";
export const DEFAULT_OSS_REBUILD_URL = "https://storage.googleapis.com/google-rebuild-attestations/cratesio";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

const authoritySchema = z.object({
  baseUrl: z.string().url(),
  pacingMs: z.coerce.number().int().nonnegative(),
});

export const appConfigSchema = z.object({
  port: z.coerce.number().int().nonnegative(),
  cache: z.object({
    directory: z.string().min(1),
  }),
  database: z.object({
    url: optionalString,
  }),
  objectStorage: z.object({
    bucket: optionalString,
    region: optionalString,
    endpoint: optionalString,
    accessKeyId: optionalString,
    secretAccessKey: optionalString,
    prefix: optionalString,
  }),
  http: z.object({
    userAgent: z.string().min(1),
    timeoutMs: z.coerce.number().int().positive(),
    maxRetries: z.coerce.number().int().nonnegative(),
    retryBaseDelayMs: z.coerce.number().int().nonnegative(),
  }),
  authorities: z.object({
    cratesIo: authoritySchema,
    ossRebuild: authoritySchema,
  }),
  evaluation: z.object({
    packageTimeBudgetMs: z.coerce.number().int().positive(),
  }),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type HttpConfig = AppConfig["http"];
export type AuthorityConfig = AppConfig["authorities"]["cratesIo"];
export type ObjectStorageConfig = AppConfig["objectStorage"];

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return appConfigSchema.parse({
    port: env.PORT ?? "8080",
    cache: {
      directory: env.VERACITY_CACHE_DIR ?? join(homedir(), ".veracity", "checks"),
    },
    database: {
      url: env.DATABASE_URL,
    },
    objectStorage: {
      bucket: env.OBJECT_BUCKET,
      region: env.OBJECT_REGION,
      endpoint: env.OBJECT_ENDPOINT,
      accessKeyId: env.OBJECT_ACCESS_KEY_ID,
      secretAccessKey: env.OBJECT_SECRET_ACCESS_KEY,
      prefix: env.OBJECT_PREFIX,
    },
    http: {
      userAgent: env.HTTP_USER_AGENT ?? "veracity/0.1.0",
      timeoutMs: env.HTTP_TIMEOUT_MS ?? "15000",
      maxRetries: env.HTTP_MAX_RETRIES ?? "2",
      retryBaseDelayMs: env.HTTP_RETRY_BASE_DELAY_MS ?? "500",
    },
    authorities: {
      cratesIo: {
        baseUrl: env.CRATES_IO_URL ?? DEFAULT_CRATES_IO_URL,
        pacingMs: env.CRATES_IO_PACING_MS ?? "1100",
      },
      ossRebuild: {
        baseUrl: env.OSS_REBUILD_URL ?? DEFAULT_OSS_REBUILD_URL,
        pacingMs: env.OSS_REBUILD_PACING_MS ?? "0",
      },
    },
    evaluation: {
      packageTimeBudgetMs: env.PACKAGE_TIME_BUDGET_MS ?? "1100",
    },
  });
}
