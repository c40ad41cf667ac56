import { Client } from "minio";
import { ListObjectsV2Command, S3Client } from "@aws-sdk/client-s3";
import logger from "../utils/logger";
import { normalizePrefix } from "../utils/paths";
import type { TrackerConfig } from "../config";
import type { UrlSigner } from "../models/transfer.model";
import type { ObjectLister, RemoteObject } from "./listing.service";

type StorageConfig = TrackerConfig["storage"];

class StorageService implements UrlSigner, ObjectLister {
  private client: Client;
  private s3Client: S3Client;
  private bucket: string;

  constructor(config: StorageConfig) {
    const [host, portStr] = config.endpoint.split(":");
    const port = parseInt(portStr || (config.useSSL ? "443" : "9000"), 10);

    // MinIO client for bucket bootstrap and presigned PUT URLs. Passing
    // the region keeps presigning offline.
    this.client = new Client({
      endPoint: host,
      port,
      useSSL: config.useSSL,
      accessKey: config.accessKey,
      secretKey: config.secretKey,
      region: config.region,
    });

    // AWS SDK client for paged listing
    this.s3Client = new S3Client({
      endpoint: `${config.useSSL ? "https" : "http"}://${config.endpoint}`,
      region: config.region,
      credentials: {
        accessKeyId: config.accessKey,
        secretAccessKey: config.secretKey,
      },
      forcePathStyle: true,
    });

    this.bucket = config.bucket;
    logger.info(
      `StorageService initialized with endpoint: ${config.endpoint}, bucket: ${this.bucket}`,
    );
  }

  async ensureBucket(region: string): Promise<void> {
    try {
      const exists = await this.client.bucketExists(this.bucket);
      if (!exists) {
        await this.client.makeBucket(this.bucket, region);
        logger.info(`Bucket created: ${this.bucket}`);
      } else {
        logger.info(`Bucket already exists: ${this.bucket}`);
      }
    } catch (error) {
      logger.error(`Error ensuring bucket ${this.bucket}:`, error);
      throw error;
    }
  }

  async presignPut(objectKey: string, expiresInSec: number): Promise<string> {
    try {
      const url = await this.client.presignedPutObject(this.bucket, objectKey, expiresInSec);
      logger.debug(`Generated presigned PUT URL for ${objectKey}, expires in ${expiresInSec}s`);
      return url;
    } catch (error) {
      logger.error(`Error generating presigned PUT URL for ${objectKey}:`, error);
      throw error;
    }
  }

  /**
   * Every object under `prefix`, one ListObjectsV2 page at a time. An
   * aborted `signal` cancels the request in flight and stops paging; the
   * caller decides what an early stop means.
   */
  async *listObjects(prefix: string, signal?: AbortSignal): AsyncGenerator<RemoteObject> {
    const cleanPrefix = normalizePrefix(prefix);
    let continuationToken: string | undefined;
    let page = 0;

    do {
      if (signal?.aborted) return;

      const response = await this.s3Client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: cleanPrefix || undefined,
          ContinuationToken: continuationToken,
          MaxKeys: 1000,
        }),
        { abortSignal: signal },
      );
      page++;
      logger.debug(`Listed page ${page} of s3://${this.bucket}/${cleanPrefix}`, {
        keys: response.KeyCount,
      });

      for (const object of response.Contents ?? []) {
        if (object.Key === undefined) continue;
        yield { key: object.Key, size: object.Size ?? 0, etag: object.ETag };
      }

      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);
  }
}

export default StorageService;
