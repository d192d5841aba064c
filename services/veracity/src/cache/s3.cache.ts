import {
  DeleteObjectsCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  NoSuchKey,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import { Injectable, Logger } from "@nestjs/common";

import type { ObjectStorageConfig } from "../config.js";
import type { PackageIdentity, VeracityChecks } from "../types.js";
import { CHECKS_FILE_NAME, parseChecks, safeSegment, serializeChecks } from "./checks.document.js";
import { CacheError } from "./veracity.cache.js";
import type { VeracityCache } from "./veracity.cache.js";

export function createS3Client(config: ObjectStorageConfig): S3Client {
  return new S3Client({
    region: config.region ?? "us-east-1",
    endpoint: config.endpoint,
    forcePathStyle: Boolean(config.endpoint),
    credentials: config.accessKeyId && config.secretAccessKey
      ? {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      }
      : undefined,
  });
}

function isMissingKey(error: unknown): boolean {
  return error instanceof NoSuchKey || (error instanceof Error && error.name === "NoSuchKey");
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Same JSON document as the filesystem cache, one object per package. */
@Injectable()
export class S3VeracityCache implements VeracityCache {
  private readonly logger = new Logger(S3VeracityCache.name);
  private readonly bucket: string;
  private readonly prefix: string;

  constructor(
    config: ObjectStorageConfig,
    private readonly client: S3Client = createS3Client(config),
  ) {
    if (!config.bucket) {
      throw new Error("S3 bucket must be configured");
    }
    this.bucket = config.bucket;
    this.prefix = config.prefix ? `${config.prefix.replace(/\/$/, "")}/` : "";
  }

  async get(identity: PackageIdentity): Promise<VeracityChecks | undefined> {
    const key = this.buildKey(identity);
    let raw: string;
    try {
      const output = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!output.Body) {
        return undefined;
      }
      raw = await output.Body.transformToString("utf-8");
    } catch (error) {
      if (isMissingKey(error)) {
        return undefined;
      }
      throw new CacheError(`cannot read s3://${this.bucket}/${key}: ${describe(error)}`, { cause: error });
    }
    return parseChecks(raw, `s3://${this.bucket}/${key}`);
  }

  async put(identity: PackageIdentity, checks: VeracityChecks): Promise<void> {
    const key = this.buildKey(identity);
    try {
      await this.client.send(new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: serializeChecks(identity, checks),
        ContentType: "application/json",
      }));
    } catch (error) {
      throw new CacheError(`cannot write s3://${this.bucket}/${key}: ${describe(error)}`, { cause: error });
    }
  }

  async clear(): Promise<void> {
    let removed = 0;
    try {
      let continuationToken: string | undefined;
      do {
        const listing = await this.client.send(new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: this.prefix || undefined,
          ContinuationToken: continuationToken,
        }));
        const keys = (listing.Contents ?? [])
          .map((object) => object.Key)
          .filter((key): key is string => typeof key === "string" && key.endsWith(`/${CHECKS_FILE_NAME}`));
        if (keys.length > 0) {
          await this.client.send(new DeleteObjectsCommand({
            Bucket: this.bucket,
            Delete: { Objects: keys.map((Key) => ({ Key })) },
          }));
          removed += keys.length;
        }
        continuationToken = listing.IsTruncated ? listing.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (error) {
      throw new CacheError(`cannot clear s3://${this.bucket}/${this.prefix}: ${describe(error)}`, { cause: error });
    }
    this.logger.log(`Removed ${removed} cached checks from bucket ${this.bucket}`);
  }

  private buildKey(identity: PackageIdentity): string {
    return `${this.prefix}${safeSegment(identity.name)}/${safeSegment(identity.version)}/${CHECKS_FILE_NAME}`;
  }
}
