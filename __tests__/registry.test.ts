import path from 'path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  AlreadyExistsError,
  NotFoundError,
  RegistryCorruptError,
  RegistryPersistError,
  ValidationError,
} from '../src/services/knowledge/errors';
import {
  FileRegistryPersistence,
  KnowledgeRegistry,
  RegistryPersistence,
} from '../src/services/knowledge/registry';
import type { KnowledgeFile } from '../src/services/knowledge/types';
import { TEST_SEED, makeTempDir } from './helpers';

class FlakyPersistence implements RegistryPersistence {
  readonly location = 'memory://registry.json';
  saved: string | null = null;
  failNextSave = false;

  async load(): Promise<string | null> {
    return this.saved;
  }

  async save(serialized: string): Promise<void> {
    if (this.failNextSave) {
      this.failNextSave = false;
      throw new Error('write refused');
    }
    this.saved = serialized;
  }
}

function fileRecord(id: string, agentIds: string[]): KnowledgeFile {
  return {
    id,
    name: `File ${id}`,
    description: '',
    file_path: `files/${id}`,
    agent_ids: agentIds,
    uploaded_at: '2024-01-01T00:00:00.000Z',
    file_size: 10,
    content_type: 'application/zip',
  };
}

describe('KnowledgeRegistry', () => {
  let tmp: string;
  let registryPath: string;

  beforeEach(async () => {
    tmp = await makeTempDir();
    registryPath = path.join(tmp, 'registry.json');
  });

  afterEach(async () => {
    await fs.remove(tmp);
  });

  it('seeds and persists the default agent when no registry exists', async () => {
    const registry = await KnowledgeRegistry.open(new FileRegistryPersistence(registryPath), TEST_SEED);

    const agents = registry.listAgents();
    expect(agents).toHaveLength(1);
    expect(agents[0]).toMatchObject({
      id: 'default-agent',
      name: 'Default Agent',
      description: 'Default agent seeded on first start',
      tenant_id: 'default',
    });
    expect(agents[0]).not.toHaveProperty('api_key');

    const persisted = await fs.readJson(registryPath);
    expect(persisted.knowledge_files).toEqual([]);
    expect(persisted.agents[0].id).toBe('default-agent');
    expect(typeof persisted.agents[0].api_key).toBe('string');
    expect(await fs.pathExists(`${registryPath}.tmp`)).toBe(false);
  });

  it('loads an existing registry instead of reseeding', async () => {
    const first = await KnowledgeRegistry.open(new FileRegistryPersistence(registryPath), TEST_SEED);
    await first.addAgent({
      id: 'support-bot',
      name: 'Support',
      description: '',
      tenant_id: 't1',
      api_key: 'test-key',
      created_at: '2024-01-01T00:00:00.000Z',
    });

    const reopened = await KnowledgeRegistry.open(new FileRegistryPersistence(registryPath), {
      ...TEST_SEED,
      id: 'other-default',
    });

    expect(reopened.listAgents().map((a) => a.id)).toEqual(['default-agent', 'support-bot']);
  });

  it('treats null collections in a stored registry as empty', async () => {
    await fs.writeFile(registryPath, JSON.stringify({ agents: null, knowledge_files: null }));

    const registry = await KnowledgeRegistry.open(new FileRegistryPersistence(registryPath), TEST_SEED);

    expect(registry.listAgents()).toEqual([]);
    expect(registry.listFiles()).toEqual([]);
  });

  it('refuses to start on a malformed registry', async () => {
    await fs.writeFile(registryPath, '{ not json');

    await expect(KnowledgeRegistry.open(new FileRegistryPersistence(registryPath), TEST_SEED)).rejects.toBeInstanceOf(
      RegistryCorruptError,
    );
  });

  it('hands out copies that cannot alter registry state', async () => {
    const registry = await KnowledgeRegistry.open(new FlakyPersistence(), TEST_SEED);
    await registry.addFile(fileRecord('f1', ['default-agent']));

    const files = registry.listFiles();
    files[0].agent_ids.push('intruder');
    files[0].name = 'changed';

    expect(registry.findFile('f1')?.agent_ids).toEqual(['default-agent']);
    expect(registry.findFile('f1')?.name).toBe('File f1');
  });

  it('filters files by agent', async () => {
    const registry = await KnowledgeRegistry.open(new FlakyPersistence(), TEST_SEED);
    await registry.addAgent({ id: 'b', name: 'B', description: '', tenant_id: 't', created_at: 'now' });
    await registry.addFile(fileRecord('f1', ['default-agent']));
    await registry.addFile(fileRecord('f2', ['default-agent', 'b']));
    await registry.addFile(fileRecord('f3', ['b']));

    expect(registry.filesForAgent('default-agent').map((f) => f.id)).toEqual(['f1', 'f2']);
    expect(registry.filesForAgent('b').map((f) => f.id)).toEqual(['f2', 'f3']);
    expect(registry.filesForAgent('nobody')).toEqual([]);
  });

  it('rejects files that reference unknown agents', async () => {
    const registry = await KnowledgeRegistry.open(new FlakyPersistence(), TEST_SEED);

    await expect(registry.addFile(fileRecord('f1', ['default-agent', 'ghost']))).rejects.toThrow(
      new ValidationError('unknown agent IDs: ghost'),
    );
    expect(registry.listFiles()).toEqual([]);
  });

  it('reports a missing file on removal', async () => {
    const registry = await KnowledgeRegistry.open(new FlakyPersistence(), TEST_SEED);

    await expect(registry.removeFile('missing')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('keeps the previous snapshot when persisting fails', async () => {
    const persistence = new FlakyPersistence();
    const registry = await KnowledgeRegistry.open(persistence, TEST_SEED);
    const before = persistence.saved;
    persistence.failNextSave = true;

    await expect(
      registry.addAgent({ id: 'x', name: 'X', description: '', tenant_id: 't', created_at: 'now' }),
    ).rejects.toBeInstanceOf(RegistryPersistError);

    expect(registry.findAgent('x')).toBeUndefined();
    expect(persistence.saved).toBe(before);
  });

  it('lets concurrent creations of distinct agents all succeed', async () => {
    const registry = await KnowledgeRegistry.open(new FileRegistryPersistence(registryPath), TEST_SEED);
    const ids = Array.from({ length: 10 }, (_, i) => `agent-${i}`);

    await Promise.all(
      ids.map((id) => registry.addAgent({ id, name: id, description: '', tenant_id: 't', created_at: 'now' })),
    );

    expect(registry.listAgents()).toHaveLength(11);
    const persisted = await fs.readJson(registryPath);
    expect(persisted.agents).toHaveLength(11);
  });

  it('lets exactly one of two concurrent creations of the same agent succeed', async () => {
    const registry = await KnowledgeRegistry.open(new FlakyPersistence(), TEST_SEED);
    const agent = { id: 'dup', name: 'Dup', description: '', tenant_id: 't', created_at: 'now' };

    const results = await Promise.allSettled([registry.addAgent(agent), registry.addAgent(agent)]);

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toBeInstanceOf(AlreadyExistsError);
    expect(registry.listAgents().filter((a) => a.id === 'dup')).toHaveLength(1);
  });
});
