import { ListObjectsV2Command, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import type { StorageConfig } from "../types/config.js";
import type { BlobObject, BlobStore } from "./blob-store.js";

function contentTypeFor(key: string): string {
  return key.endsWith(".zip") ? "application/zip" : "application/octet-stream";
}

export class S3BlobStore implements BlobStore {
  constructor(private readonly client: S3Client) {}

  static fromConfig(config: StorageConfig): S3BlobStore {
    return new S3BlobStore(
      new S3Client({
        region: config.region,
        endpoint: config.endpoint,
        forcePathStyle: config.endpoint !== undefined,
      }),
    );
  }

  async put(bucket: string, key: string, body: Uint8Array): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: body,
        ContentType: contentTypeFor(key),
      }),
    );
  }

  async list(bucket: string, prefix: string): Promise<BlobObject[]> {
    const res = await this.client.send(new ListObjectsV2Command({ Bucket: bucket, Prefix: prefix }));
    const objects: BlobObject[] = [];
    for (const item of res.Contents ?? []) {
      if (!item.Key) continue;
      objects.push({ key: item.Key, size: item.Size ?? 0, last_modified: item.LastModified ?? null });
    }
    return objects;
  }
}
