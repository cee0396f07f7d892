import { z } from 'zod';
import type { Readable } from 'stream';
import type { KnowledgeError } from './errors';
import type { OperationOptions } from './deadline';

// Persisted shapes keep snake_case keys: registry.json is shared with existing deployments.
export const AgentSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string().default(''),
  tenant_id: z.string(),
  api_key: z.string().optional(),
  created_at: z.string(),
});

export const KnowledgeFileSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string().default(''),
  file_path: z.string(),
  agent_ids: z.array(z.string()),
  uploaded_at: z.string(),
  file_size: z.number().int().nonnegative(),
  content_type: z.string().default(''),
});

export const RegistrySchema = z.object({
  agents: z.array(AgentSchema).nullable().default([]).transform((agents) => agents ?? []),
  knowledge_files: z.array(KnowledgeFileSchema).nullable().default([]).transform((files) => files ?? []),
});

export type Agent = z.infer<typeof AgentSchema>;
export type KnowledgeFile = z.infer<typeof KnowledgeFileSchema>;
export type RegistryData = z.infer<typeof RegistrySchema>;

/** An agent as callers see it: the API key never leaves the registry. */
export type PublicAgent = Omit<Agent, 'api_key'>;

export type StorageType = 'local' | 'gcs';

export interface ExtractionResult {
  success: boolean;
  files_extracted: number;
  markdown_files: number;
  total_size_bytes: number;
  error?: KnowledgeError;
}

export interface StoreKnowledgeFileInput {
  name: string;
  description?: string;
  agentIds: string[];
  content: Buffer | Readable;
  contentType?: string;
}

export interface StoredKnowledgeFile {
  file: KnowledgeFile;
  extraction: ExtractionResult;
}

export interface CreateAgentInput {
  id: string;
  name: string;
  description?: string;
  tenantId: string;
}

/** Outcome of the best-effort physical sweep that follows a registry delete. */
export interface CleanupReport {
  deleted: number;
  failed: number;
  timed_out: boolean;
  complete: boolean;
}

export interface DeleteResult {
  file: KnowledgeFile;
  cleanup: CleanupReport;
}

/**
 * Capability contract shared by every storage backend.
 * Registry queries are synchronous reads of the last committed snapshot;
 * everything touching bytes is asynchronous and honours `options.signal`.
 */
export interface StorageBackend {
  readonly kind: StorageType;

  storeKnowledgeFile(input: StoreKnowledgeFileInput, options?: OperationOptions): Promise<StoredKnowledgeFile>;
  getKnowledgeFile(id: string): KnowledgeFile;
  getKnowledgeFilesForAgent(agentId: string): KnowledgeFile[];
  getAllKnowledgeFiles(): KnowledgeFile[];
  deleteKnowledgeFile(id: string, options?: OperationOptions): Promise<DeleteResult>;

  getAllAgents(): PublicAgent[];
  getAgent(agentId: string): PublicAgent | undefined;
  createAgent(input: CreateAgentInput, options?: OperationOptions): Promise<PublicAgent>;

  /** Relative (forward-slash) paths of every extracted document of a file, sorted. */
  listDocuments(file: KnowledgeFile, options?: OperationOptions): Promise<string[]>;
  readDocument(file: KnowledgeFile, relativePath: string, options?: OperationOptions): Promise<string>;

  close(): Promise<void>;
}
