import path from 'path';
import fs from 'fs-extra';
import logger from '../../utils/logger';
import { compareWalkOrder, toPosix } from '../../utils/paths';
import { DirectorySink, extractArchive } from './archive';
import { ARCHIVE_NAME, BackendOptions, BaseStorageBackend, EXTRACTED_DIR, FILES_DIR } from './backend';
import { OperationOptions, ensureActive } from './deadline';
import { StorageReadError, StorageWriteError, ValidationError, describeError } from './errors';
import { AgentSeed, FileRegistryPersistence, KnowledgeRegistry, REGISTRY_KEY } from './registry';
import { CleanupReport, ExtractionResult, KnowledgeFile } from './types';

const log = logger.child({ module: 'Knowledge:Local' });

/** Every regular file below `root`, as forward-slash paths relative to it, in walk order. */
async function walkFiles(root: string): Promise<string[]> {
  const found: string[] = [];
  const visit = async (dir: string) => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await visit(full);
      } else if (entry.isFile()) {
        found.push(toPosix(path.relative(root, full)));
      }
    }
  };
  await visit(root);
  return found.sort(compareWalkOrder);
}

/**
 * Keeps knowledge on the local filesystem:
 *
 *   <base>/registry.json
 *   <base>/files/<file_id>/content.zip
 *   <base>/files/<file_id>/extracted/...
 */
export class LocalStorageBackend extends BaseStorageBackend {
  readonly kind = 'local' as const;

  private constructor(private readonly basePath: string, registry: KnowledgeRegistry, options: BackendOptions) {
    super(registry, log, options);
  }

  static async create(basePath: string, seed: AgentSeed, options: BackendOptions = {}): Promise<LocalStorageBackend> {
    const root = path.resolve(basePath);
    try {
      await fs.ensureDir(path.join(root, FILES_DIR));
    } catch (err) {
      throw new StorageWriteError(`failed to create base directory ${root}: ${describeError(err)}`, { cause: err });
    }

    const registry = await KnowledgeRegistry.open(new FileRegistryPersistence(path.join(root, REGISTRY_KEY)), seed);
    log.info(`Local knowledge storage ready at ${root}`);
    return new LocalStorageBackend(root, registry, options);
  }

  protected fileLocation(fileId: string): string {
    return path.join(this.basePath, FILES_DIR, fileId);
  }

  protected async writeArchive(location: string, content: Buffer): Promise<void> {
    try {
      await fs.outputFile(path.join(location, ARCHIVE_NAME), content);
    } catch (err) {
      throw new StorageWriteError(`failed to save file: ${describeError(err)}`, { cause: err });
    }
  }

  protected async extractInto(location: string, _content: Buffer, signal?: AbortSignal): Promise<ExtractionResult> {
    ensureActive(signal, 'extract archive');
    return extractArchive(path.join(location, ARCHIVE_NAME), new DirectorySink(path.join(location, EXTRACTED_DIR)));
  }

  protected async sweepLocation(location: string, signal: AbortSignal): Promise<CleanupReport> {
    if (!(await fs.pathExists(location))) {
      return { deleted: 0, failed: 0, timed_out: false, complete: true };
    }

    let files: string[];
    try {
      files = await walkFiles(location);
    } catch (err) {
      log.error({ location, error: describeError(err) }, 'Error listing files to delete');
      return { deleted: 0, failed: 1, timed_out: false, complete: false };
    }

    let deleted = 0;
    let failed = 0;
    for (const relative of files) {
      if (signal.aborted) {
        log.warn({ location, deleted_count: deleted, error_count: failed }, 'Deadline exceeded while deleting files');
        return { deleted, failed, timed_out: true, complete: false };
      }
      try {
        await fs.remove(path.join(location, relative));
        deleted++;
      } catch (err) {
        log.error({ file: relative, error: describeError(err) }, 'Failed to delete file');
        failed++;
      }
    }

    if (failed === 0) {
      try {
        await fs.remove(location);
      } catch (err) {
        log.error({ location, error: describeError(err) }, 'Failed to delete file directory');
        failed++;
      }
    }

    return { deleted, failed, timed_out: false, complete: failed === 0 };
  }

  private extractedRoot(file: KnowledgeFile): string {
    return path.resolve(file.file_path, EXTRACTED_DIR);
  }

  async listDocuments(file: KnowledgeFile, options: OperationOptions = {}): Promise<string[]> {
    ensureActive(options.signal, 'list documents');
    const root = this.extractedRoot(file);
    // An archive without file entries never creates the directory
    if (!(await fs.pathExists(root))) return [];
    try {
      return await walkFiles(root);
    } catch (err) {
      throw new StorageReadError(`failed to walk extracted directory ${root}: ${describeError(err)}`, { cause: err });
    }
  }

  async readDocument(file: KnowledgeFile, relativePath: string, options: OperationOptions = {}): Promise<string> {
    ensureActive(options.signal, 'read document');
    const root = this.extractedRoot(file);
    const target = path.resolve(root, relativePath);
    if (!target.startsWith(root + path.sep)) {
      throw new ValidationError(`document path escapes the extracted directory: ${relativePath}`);
    }
    try {
      return await fs.readFile(target, 'utf-8');
    } catch (err) {
      throw new StorageReadError(`failed to read document ${relativePath}: ${describeError(err)}`, { cause: err });
    }
  }

  async close(): Promise<void> {
    // Nothing held open between calls
  }
}
