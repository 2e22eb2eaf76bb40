export type BlobObject = {
  key: string;
  size: number;
  last_modified: Date | null;
};

/** Key/value object storage. `put` overwrites whatever is stored at the key. */
export interface BlobStore {
  put(bucket: string, key: string, body: Uint8Array): Promise<void>;
  list(bucket: string, prefix: string): Promise<BlobObject[]>;
}
