import os from 'os';
import path from 'path';
import { z } from 'zod';

export const GcsConfigSchema = z.object({
  bucket: z.string().default(''),
  project_id: z.string().optional(),
  key_file: z.string().optional(), // service account JSON; ADC when unset
});

export const StorageConfigSchema = z.object({
  type: z.enum(['local', 'gcs']).default('local'),
  local_path: z.string().default('./knowledge'),
  gcs: GcsConfigSchema.default({}),
  cache_dir: z.string().default(path.join(os.tmpdir(), 'agent-knowledge-cache')),
  cache_ttl_ms: z.coerce.number().int().nonnegative().default(24 * 60 * 60 * 1000), // 0 = never expire
  delete_timeout_ms: z.coerce.number().int().positive().default(30_000),
});

export const RetrievalConfigSchema = z.object({
  max_tokens: z.coerce.number().int().positive().default(50_000),
  chars_per_token: z.coerce.number().positive().default(4),
});

export const ServerConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(8081),
  host: z.string().default('0.0.0.0'),
  max_upload_bytes: z.coerce.number().int().positive().default(50 * 1024 * 1024),
  admin_token: z.string().optional(),
});

export const DefaultAgentConfigSchema = z.object({
  id: z.string().min(1).default('default-agent'),
  name: z.string().min(1).default('Default Agent'),
  description: z.string().default('Default agent seeded on first start'),
  tenant_id: z.string().min(1).default('default'),
});

export const ConfigSchema = z.object({
  storage: StorageConfigSchema.default({}),
  retrieval: RetrievalConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
  default_agent: DefaultAgentConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
