import type { StorageConfig } from '../../config/schema';
import { resolvePath } from '../../utils/paths';
import { ValidationError } from './errors';
import { GcsObjectStore, ObjectStore } from './object_store';
import type { AgentSeed } from './registry';
import { CloudStorageBackend } from './store_gcs';
import { LocalStorageBackend } from './store_local';
import type { StorageBackend } from './types';

export interface BackendFactoryOptions {
  /** Replaces the Google Cloud Storage client, e.g. with an in-memory store. */
  objectStore?: ObjectStore;
}

/** Builds the backend `storage.type` selects. */
export async function createStorageBackend(
  storage: StorageConfig,
  seed: AgentSeed,
  options: BackendFactoryOptions = {},
): Promise<StorageBackend> {
  switch (storage.type) {
    case 'local':
      return LocalStorageBackend.create(resolvePath(storage.local_path), seed, {
        deleteTimeoutMs: storage.delete_timeout_ms,
      });
    case 'gcs': {
      const bucket = storage.gcs.bucket.trim();
      if (!bucket) {
        throw new ValidationError('GCS bucket name is required when storage type is gcs');
      }
      const store =
        options.objectStore ??
        new GcsObjectStore({ bucket, projectId: storage.gcs.project_id, keyFile: storage.gcs.key_file });
      return CloudStorageBackend.create(store, seed, {
        cacheDir: resolvePath(storage.cache_dir),
        cacheTtlMs: storage.cache_ttl_ms,
        deleteTimeoutMs: storage.delete_timeout_ms,
      });
    }
  }
}
