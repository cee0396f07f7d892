import { Readable } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import type { Logger } from '../../utils/logger';
import { ARCHIVE_EXTENSION } from './archive';
import { OperationOptions, ensureActive, withDeadline } from './deadline';
import {
  NotFoundError,
  StorageWriteError,
  TimeoutError,
  ValidationError,
  describeError,
} from './errors';
import { KnowledgeRegistry, generateApiKey } from './registry';
import {
  CleanupReport,
  CreateAgentInput,
  DeleteResult,
  ExtractionResult,
  KnowledgeFile,
  PublicAgent,
  StorageBackend,
  StorageType,
  StoreKnowledgeFileInput,
  StoredKnowledgeFile,
} from './types';

export const DEFAULT_DELETE_TIMEOUT_MS = 30_000;
export const DEFAULT_CONTENT_TYPE = 'application/zip';

export const FILES_DIR = 'files';
export const ARCHIVE_NAME = `content.${ARCHIVE_EXTENSION}`;
export const EXTRACTED_DIR = 'extracted';

export interface BackendOptions {
  /** Time budget for the physical sweep that follows a delete. */
  deleteTimeoutMs?: number;
}

/** Trims, drops blanks and de-duplicates while keeping first-seen order. */
export function normalizeAgentIds(agentIds: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const raw of agentIds) {
    const id = raw.trim();
    if (id) seen.add(id);
  }
  return [...seen];
}

async function readContent(content: Buffer | Readable): Promise<Buffer> {
  if (Buffer.isBuffer(content)) return content;
  const chunks: Buffer[] = [];
  try {
    for await (const chunk of content) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
  } catch (err) {
    throw new StorageWriteError(`failed to save file: ${describeError(err)}`, { cause: err });
  }
  return Buffer.concat(chunks);
}

/**
 * Registry bookkeeping shared by every backend. Subclasses only decide where
 * bytes live: how the archive is written, where it is extracted, how a file's
 * objects are enumerated, read and swept.
 */
export abstract class BaseStorageBackend implements StorageBackend {
  abstract readonly kind: StorageType;

  protected constructor(
    protected readonly registry: KnowledgeRegistry,
    protected readonly log: Logger,
    protected readonly options: BackendOptions = {},
  ) {}

  /** The opaque locator recorded as `file_path` for a new file. */
  protected abstract fileLocation(fileId: string): string;

  protected abstract writeArchive(location: string, content: Buffer, contentType: string, signal?: AbortSignal): Promise<void>;

  protected abstract extractInto(location: string, content: Buffer, signal?: AbortSignal): Promise<ExtractionResult>;

  /**
   * Deletes every physical object under `location`, attempting all of them.
   * Must report failures instead of throwing.
   */
  protected abstract sweepLocation(location: string, signal: AbortSignal): Promise<CleanupReport>;

  abstract listDocuments(file: KnowledgeFile, options?: OperationOptions): Promise<string[]>;

  abstract readDocument(file: KnowledgeFile, relativePath: string, options?: OperationOptions): Promise<string>;

  abstract close(): Promise<void>;

  async storeKnowledgeFile(input: StoreKnowledgeFileInput, options: OperationOptions = {}): Promise<StoredKnowledgeFile> {
    const name = input.name.trim();
    if (!name) {
      throw new ValidationError('name is required');
    }
    const agentIds = normalizeAgentIds(input.agentIds);
    if (agentIds.length === 0) {
      throw new ValidationError('at least one agent ID is required');
    }
    ensureActive(options.signal, 'store knowledge file');

    const content = await readContent(input.content);
    const fileId = uuidv4();
    const location = this.fileLocation(fileId);
    const contentType = input.contentType || DEFAULT_CONTENT_TYPE;

    this.log.info({ file_id: fileId, name, agent_ids: agentIds, size: content.length }, 'Storing knowledge file');

    try {
      await this.writeArchive(location, content, contentType, options.signal);

      const extraction = await this.extractInto(location, content, options.signal);
      if (!extraction.success) {
        throw extraction.error ?? new StorageWriteError('failed to extract archive');
      }
      ensureActive(options.signal, 'store knowledge file');

      // Bytes are in place before the record is committed, so no reader ever sees a file without content
      const file = await this.registry.addFile(
        {
          id: fileId,
          name,
          description: input.description ?? '',
          file_path: location,
          agent_ids: agentIds,
          uploaded_at: new Date().toISOString(),
          file_size: content.length,
          content_type: contentType,
        },
        options.signal,
      );

      this.log.info(
        { file_id: fileId, files_extracted: extraction.files_extracted, markdown_files: extraction.markdown_files },
        'Knowledge file stored',
      );
      return { file, extraction };
    } catch (err) {
      this.log.error({ file_id: fileId, error: describeError(err) }, 'Failed to store knowledge file, discarding written objects');
      const cleanup = await this.sweep(location);
      if (!cleanup.complete) {
        this.log.warn({ file_id: fileId, location, ...cleanup }, 'Orphaned objects left behind by failed upload');
      }
      throw err;
    }
  }

  getKnowledgeFile(id: string): KnowledgeFile {
    const file = this.registry.findFile(id);
    if (!file) {
      throw new NotFoundError('knowledge file', id);
    }
    return file;
  }

  getKnowledgeFilesForAgent(agentId: string): KnowledgeFile[] {
    return this.registry.filesForAgent(agentId);
  }

  getAllKnowledgeFiles(): KnowledgeFile[] {
    return this.registry.listFiles();
  }

  /**
   * Removes the registry entry first; that is the operation's outcome. The
   * physical sweep runs afterwards and only ever shows up in `cleanup`.
   */
  async deleteKnowledgeFile(id: string, options: OperationOptions = {}): Promise<DeleteResult> {
    const file = await this.registry.removeFile(id, options.signal);
    this.log.info({ file_id: id, file_name: file.name, file_path: file.file_path }, 'Knowledge file removed from registry');

    const cleanup = await this.sweep(file.file_path, options.signal);
    this.log.info({ file_id: id, ...cleanup }, 'Completed file deletion from storage');
    return { file, cleanup };
  }

  getAllAgents(): PublicAgent[] {
    return this.registry.listAgents();
  }

  getAgent(agentId: string): PublicAgent | undefined {
    return this.registry.findAgent(agentId);
  }

  async createAgent(input: CreateAgentInput, options: OperationOptions = {}): Promise<PublicAgent> {
    const id = input.id.trim();
    const name = input.name.trim();
    const tenantId = input.tenantId.trim();
    if (!id || !name || !tenantId) {
      throw new ValidationError('ID, name, and tenant ID are required');
    }

    const created = await this.registry.addAgent(
      {
        id,
        name,
        description: input.description ?? '',
        tenant_id: tenantId,
        api_key: generateApiKey(),
        created_at: new Date().toISOString(),
      },
      options.signal,
    );
    this.log.info({ agent_id: id, tenant_id: tenantId }, 'Agent created');
    return created;
  }

  private async sweep(location: string, parent?: AbortSignal): Promise<CleanupReport> {
    const deadline = withDeadline(this.options.deleteTimeoutMs ?? DEFAULT_DELETE_TIMEOUT_MS, parent);
    try {
      return await this.sweepLocation(location, deadline.signal);
    } catch (err) {
      this.log.error({ location, error: describeError(err) }, 'Physical cleanup aborted');
      return { deleted: 0, failed: 0, timed_out: err instanceof TimeoutError, complete: false };
    } finally {
      deadline.dispose();
    }
  }
}
