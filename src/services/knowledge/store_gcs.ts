import path from 'path';
import logger from '../../utils/logger';
import { compareWalkOrder } from '../../utils/paths';
import { ExtractionSink, extractArchive } from './archive';
import { ARCHIVE_NAME, BackendOptions, BaseStorageBackend, EXTRACTED_DIR, FILES_DIR } from './backend';
import { OperationOptions, ensureActive, raceSignal } from './deadline';
import { StorageReadError, StorageWriteError, TimeoutError, ValidationError, describeError } from './errors';
import { ObjectCache } from './object_cache';
import { ObjectStore } from './object_store';
import { AgentSeed, KnowledgeRegistry, REGISTRY_KEY, RegistryPersistence } from './registry';
import { CleanupReport, ExtractionResult, KnowledgeFile } from './types';

const log = logger.child({ module: 'Knowledge:GCS' });

const CONTENT_TYPES: Record<string, string> = {
  '.md': 'text/markdown',
  '.markdown': 'text/markdown',
  '.txt': 'text/plain',
};

export function contentTypeFor(key: string): string {
  return CONTENT_TYPES[path.posix.extname(key).toLowerCase()] ?? 'application/octet-stream';
}

/** Keeps registry.json as an object in the bucket root. */
export class ObjectRegistryPersistence implements RegistryPersistence {
  constructor(private readonly store: ObjectStore, private readonly key: string = REGISTRY_KEY) {}

  get location(): string {
    return `gs://${this.store.bucketName}/${this.key}`;
  }

  async load(): Promise<string | null> {
    const data = await this.store.getObject(this.key);
    return data === null ? null : data.toString('utf-8');
  }

  async save(serialized: string): Promise<void> {
    await this.store.putObject(this.key, Buffer.from(serialized, 'utf-8'), 'application/json');
  }
}

/** Uploads every extracted entry as its own object under `prefix`. */
class ObjectSink implements ExtractionSink {
  constructor(
    private readonly store: ObjectStore,
    private readonly prefix: string,
    private readonly signal?: AbortSignal,
  ) {}

  get location(): string {
    return this.prefix;
  }

  async writeEntry(relativePath: string, data: Buffer): Promise<void> {
    const key = `${this.prefix}/${relativePath}`;
    await raceSignal(this.store.putObject(key, data, contentTypeFor(key)), this.signal, `upload ${key}`);
  }
}

export interface CloudBackendOptions extends BackendOptions {
  cacheDir: string;
  cacheTtlMs?: number;
}

/**
 * Keeps knowledge in an object bucket, under the same keys the local backend
 * uses as paths:
 *
 *   registry.json
 *   files/<file_id>/content.zip
 *   files/<file_id>/extracted/...
 *
 * Documents are read through an on-disk cache.
 */
export class CloudStorageBackend extends BaseStorageBackend {
  readonly kind = 'gcs' as const;

  private constructor(
    private readonly store: ObjectStore,
    private readonly cache: ObjectCache,
    registry: KnowledgeRegistry,
    options: BackendOptions,
  ) {
    super(registry, log, options);
  }

  static async create(store: ObjectStore, seed: AgentSeed, options: CloudBackendOptions): Promise<CloudStorageBackend> {
    try {
      await store.ensureBucket();
    } catch (err) {
      throw new StorageWriteError(`failed to prepare bucket ${store.bucketName}: ${describeError(err)}`, { cause: err });
    }

    const registry = await KnowledgeRegistry.open(new ObjectRegistryPersistence(store), seed);
    const cache = new ObjectCache(options.cacheDir, options.cacheTtlMs);
    log.info({ bucket: store.bucketName, cache_dir: cache.dir }, 'Cloud knowledge storage ready');
    return new CloudStorageBackend(store, cache, registry, options);
  }

  protected fileLocation(fileId: string): string {
    return `${FILES_DIR}/${fileId}`;
  }

  protected async writeArchive(location: string, content: Buffer, contentType: string, signal?: AbortSignal): Promise<void> {
    const key = `${location}/${ARCHIVE_NAME}`;
    try {
      await raceSignal(this.store.putObject(key, content, contentType), signal, `upload ${key}`);
    } catch (err) {
      if (err instanceof TimeoutError) throw err;
      throw new StorageWriteError(`failed to upload file to GCS: ${describeError(err)}`, { cause: err });
    }
  }

  protected async extractInto(location: string, content: Buffer, signal?: AbortSignal): Promise<ExtractionResult> {
    ensureActive(signal, 'extract archive');
    return extractArchive(content, new ObjectSink(this.store, `${location}/${EXTRACTED_DIR}`, signal));
  }

  protected async sweepLocation(location: string, signal: AbortSignal): Promise<CleanupReport> {
    // The trailing slash keeps files/<id> from also matching files/<id>-other
    const prefix = `${location}/`;
    let deleted = 0;
    let failed = 0;

    const timedOut = (): CleanupReport => {
      log.warn({ prefix, deleted_count: deleted, error_count: failed }, 'Deadline exceeded while deleting objects');
      return { deleted, failed, timed_out: true, complete: false };
    };

    try {
      const keys = this.store.listObjects(prefix)[Symbol.asyncIterator]();
      for (;;) {
        let next: IteratorResult<string>;
        try {
          // A stalled listing must not outlive the deadline
          next = await raceSignal(keys.next(), signal, `list ${prefix}`);
        } catch (err) {
          if (err instanceof TimeoutError) return timedOut();
          log.error({ prefix, error: describeError(err) }, 'Error listing objects to delete');
          return { deleted, failed: failed + 1, timed_out: false, complete: false };
        }
        if (next.done) break;

        const key = next.value;
        try {
          await raceSignal(this.store.deleteObject(key), signal, `delete ${key}`);
          deleted++;
        } catch (err) {
          if (err instanceof TimeoutError) return timedOut();
          log.error({ object: key, error: describeError(err) }, 'Failed to delete object');
          failed++;
        }
      }
    } finally {
      await this.cache.evictPrefix(prefix);
    }

    log.info({ prefix, deleted_count: deleted, error_count: failed }, 'Completed object deletion');
    return { deleted, failed, timed_out: false, complete: failed === 0 };
  }

  async listDocuments(file: KnowledgeFile, options: OperationOptions = {}): Promise<string[]> {
    ensureActive(options.signal, 'list documents');
    const prefix = `${file.file_path}/${EXTRACTED_DIR}/`;
    const documents: string[] = [];
    try {
      for await (const key of this.store.listObjects(prefix)) {
        ensureActive(options.signal, 'list documents');
        const relative = key.slice(prefix.length);
        // Zero-byte "folder" placeholders end in a slash
        if (relative && !relative.endsWith('/')) documents.push(relative);
      }
    } catch (err) {
      if (err instanceof TimeoutError) throw err;
      throw new StorageReadError(`failed to list objects under ${prefix}: ${describeError(err)}`, { cause: err });
    }
    return documents.sort(compareWalkOrder);
  }

  async readDocument(file: KnowledgeFile, relativePath: string, options: OperationOptions = {}): Promise<string> {
    ensureActive(options.signal, 'read document');
    if (relativePath.replace(/\\/g, '/').split('/').includes('..')) {
      throw new ValidationError(`document path escapes the extracted directory: ${relativePath}`);
    }
    const key = `${file.file_path}/${EXTRACTED_DIR}/${relativePath}`;
    let data: Buffer | null;
    try {
      data = await raceSignal(
        this.cache.get(key, () => this.store.getObject(key)),
        options.signal,
        `read ${key}`,
      );
    } catch (err) {
      if (err instanceof TimeoutError) throw err;
      throw new StorageReadError(`failed to download ${key}: ${describeError(err)}`, { cause: err });
    }
    if (data === null) {
      throw new StorageReadError(`object not found: ${key}`);
    }
    return data.toString('utf-8');
  }

  async close(): Promise<void> {
    log.debug({ bucket: this.store.bucketName }, 'Cloud knowledge storage closed');
  }
}
