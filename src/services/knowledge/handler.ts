import type { Readable } from 'stream';
import logger from '../../utils/logger';
import { ARCHIVE_EXTENSION } from './archive';
import { normalizeAgentIds } from './backend';
import type { OperationOptions } from './deadline';
import { NotFoundError, ValidationError } from './errors';
import type { KnowledgeRetriever } from './retriever';
import type { CleanupReport, ExtractionResult, KnowledgeFile, PublicAgent, StorageBackend, StorageType } from './types';

const log = logger.child({ module: 'Knowledge:Handler' });

export interface UploadRequest {
  name: string;
  description?: string;
  agentIds: string[];
  filename: string;
  content: Buffer | Readable;
  contentType?: string;
}

export interface UploadResponse {
  success: true;
  file_id: string;
  extraction: Omit<ExtractionResult, 'error'>;
}

export interface CreateAgentRequest {
  id: string;
  name: string;
  description?: string;
  tenant_id: string;
}

export interface DeleteResponse {
  success: true;
  file_id: string;
  cleanup: CleanupReport;
}

export interface HealthResponse {
  status: 'ok';
  storage: StorageType;
  agents: number;
  files: number;
}

/**
 * Management operations over a storage backend, free of any transport.
 * Every change to an agent's files invalidates that agent's retriever cache.
 */
export class KnowledgeHandler {
  constructor(
    private readonly storage: StorageBackend,
    private readonly retriever: KnowledgeRetriever,
  ) {}

  async upload(request: UploadRequest, options?: OperationOptions): Promise<UploadResponse> {
    if (!request.name.trim()) {
      throw new ValidationError('name is required');
    }
    const agentIds = normalizeAgentIds(request.agentIds);
    if (agentIds.length === 0) {
      throw new ValidationError('at least one agent ID is required');
    }
    if (!request.filename.toLowerCase().endsWith(`.${ARCHIVE_EXTENSION}`)) {
      throw new ValidationError('only ZIP files are supported');
    }

    const { file, extraction } = await this.storage.storeKnowledgeFile(
      {
        name: request.name,
        description: request.description,
        agentIds,
        content: request.content,
        contentType: request.contentType,
      },
      options,
    );

    for (const agentId of file.agent_ids) {
      this.retriever.clearAgentCache(agentId);
    }

    log.info({ file_id: file.id, filename: request.filename, agent_ids: file.agent_ids }, 'Knowledge file uploaded');
    const { error: _error, ...summary } = extraction;
    return { success: true, file_id: file.id, extraction: summary };
  }

  listFiles(agentId?: string): { files: KnowledgeFile[] } {
    const files = agentId ? this.storage.getKnowledgeFilesForAgent(agentId) : this.storage.getAllKnowledgeFiles();
    return { files };
  }

  getFile(fileId: string): KnowledgeFile {
    if (!fileId.trim()) {
      throw new ValidationError('file ID is required');
    }
    return this.storage.getKnowledgeFile(fileId);
  }

  listAgents(): { agents: PublicAgent[] } {
    return { agents: this.storage.getAllAgents() };
  }

  getAgent(agentId: string): PublicAgent {
    const agent = this.storage.getAgent(agentId);
    if (!agent) {
      throw new NotFoundError('agent', agentId);
    }
    return agent;
  }

  async createAgent(request: CreateAgentRequest, options?: OperationOptions): Promise<PublicAgent> {
    return this.storage.createAgent(
      { id: request.id, name: request.name, description: request.description, tenantId: request.tenant_id },
      options,
    );
  }

  async deleteFile(fileId: string, options?: OperationOptions): Promise<DeleteResponse> {
    if (!fileId.trim()) {
      throw new ValidationError('file ID is required');
    }
    const { file, cleanup } = await this.storage.deleteKnowledgeFile(fileId, options);

    for (const agentId of file.agent_ids) {
      this.retriever.clearAgentCache(agentId);
    }

    if (!cleanup.complete) {
      log.warn({ file_id: fileId, ...cleanup }, 'Knowledge file deleted with incomplete storage cleanup');
    }
    return { success: true, file_id: fileId, cleanup };
  }

  async getContext(agentId: string): Promise<{ agent_id: string; context: string }> {
    return { agent_id: agentId, context: await this.retriever.getKnowledgeContext(agentId) };
  }

  health(): HealthResponse {
    return {
      status: 'ok',
      storage: this.storage.kind,
      agents: this.storage.getAllAgents().length,
      files: this.storage.getAllKnowledgeFiles().length,
    };
  }
}
