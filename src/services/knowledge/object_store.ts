import { File, Storage } from '@google-cloud/storage';
import logger from '../../utils/logger';

const log = logger.child({ module: 'Knowledge:GCS' });

/**
 * The slice of a bucket API the cloud backend needs. Keys are
 * forward-slash paths relative to the bucket root.
 */
export interface ObjectStore {
  readonly bucketName: string;
  /** Creates the bucket when it does not exist yet. */
  ensureBucket(): Promise<void>;
  putObject(key: string, data: Buffer, contentType: string): Promise<void>;
  /** Resolves null when the object does not exist. */
  getObject(key: string): Promise<Buffer | null>;
  listObjects(prefix: string): AsyncIterable<string>;
  deleteObject(key: string): Promise<void>;
}

export interface GcsObjectStoreOptions {
  bucket: string;
  projectId?: string;
  /** Service account key file; application default credentials are used without it. */
  keyFile?: string;
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 404;
}

export class GcsObjectStore implements ObjectStore {
  private readonly storage: Storage;
  readonly bucketName: string;

  constructor(options: GcsObjectStoreOptions) {
    this.bucketName = options.bucket;
    this.storage = new Storage({
      projectId: options.projectId || undefined,
      keyFilename: options.keyFile || undefined,
    });
  }

  private get bucket() {
    return this.storage.bucket(this.bucketName);
  }

  async ensureBucket(): Promise<void> {
    const [exists] = await this.bucket.exists();
    if (exists) {
      log.info(`Bucket exists: ${this.bucketName}`);
      return;
    }
    log.info(`Bucket does not exist, attempting to create: ${this.bucketName}`);
    await this.storage.createBucket(this.bucketName);
    log.info(`Bucket created successfully: ${this.bucketName}`);
  }

  async putObject(key: string, data: Buffer, contentType: string): Promise<void> {
    await this.bucket.file(key).save(data, { contentType, resumable: false });
  }

  async getObject(key: string): Promise<Buffer | null> {
    try {
      const [contents] = await this.bucket.file(key).download();
      return contents;
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async *listObjects(prefix: string): AsyncIterable<string> {
    for await (const item of this.bucket.getFilesStream({ prefix })) {
      if (item instanceof File) {
        yield item.name;
      }
    }
  }

  async deleteObject(key: string): Promise<void> {
    await this.bucket.file(key).delete({ ignoreNotFound: true });
  }
}
