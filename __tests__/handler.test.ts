import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { NotFoundError, ValidationError } from '../src/services/knowledge/errors';
import { KnowledgeHandler } from '../src/services/knowledge/handler';
import { KnowledgeRetriever } from '../src/services/knowledge/retriever';
import { CloudStorageBackend } from '../src/services/knowledge/store_gcs';
import { LocalStorageBackend } from '../src/services/knowledge/store_local';
import type { StorageBackend } from '../src/services/knowledge/types';
import { MemoryObjectStore, TEST_SEED, makeTempDir, makeZip } from './helpers';

interface Harness {
  storage: StorageBackend;
  handler: KnowledgeHandler;
}

const backends: { name: string; open: (dir: string) => Promise<StorageBackend> }[] = [
  { name: 'local', open: (dir) => LocalStorageBackend.create(dir, TEST_SEED) },
  {
    name: 'gcs',
    open: (dir) => CloudStorageBackend.create(new MemoryObjectStore(), TEST_SEED, { cacheDir: dir }),
  },
];

describe.each(backends)('KnowledgeHandler over $name storage', ({ open }) => {
  let tmp: string;
  let harness: Harness;

  beforeEach(async () => {
    tmp = await makeTempDir();
    const storage = await open(tmp);
    harness = { storage, handler: new KnowledgeHandler(storage, new KnowledgeRetriever(storage)) };
  });

  afterEach(async () => {
    await harness.storage.close();
    await fs.remove(tmp);
  });

  it('serves an uploaded archive to the agent it was uploaded for', async () => {
    const { handler } = harness;
    const agent = await handler.createAgent({ id: 'finance-bot', name: 'Finance Bot', tenant_id: 'acme' });
    expect(agent.id).toBe('finance-bot');

    const upload = await handler.upload({
      name: 'Rates',
      agentIds: ['finance-bot'],
      filename: 'rates.ZIP',
      content: makeZip({ 'a.md': 'Rate: 5%', 'notes.txt': 'internal scribbles' }),
    });
    expect(upload).toMatchObject({
      success: true,
      extraction: { success: true, files_extracted: 2, markdown_files: 1, total_size_bytes: 26 },
    });

    const { agent_id, context } = await handler.getContext('finance-bot');
    expect(agent_id).toBe('finance-bot');
    expect(context).toBe('# Knowledge Base\n\n## Document 1\n\nRate: 5%\n\n---\n\n');
    expect(context).not.toContain('internal scribbles');

    expect(await handler.getContext('default-agent')).toEqual({ agent_id: 'default-agent', context: '' });
  });

  it('invalidates cached context on upload and delete', async () => {
    const { handler } = harness;
    expect((await handler.getContext('default-agent')).context).toBe('');

    const { file_id } = await handler.upload({
      name: 'Doc',
      agentIds: ['default-agent'],
      filename: 'doc.zip',
      content: makeZip({ 'a.md': 'Fresh' }),
    });
    expect((await handler.getContext('default-agent')).context).toContain('Fresh');

    const deleted = await handler.deleteFile(file_id);
    expect(deleted).toEqual({
      success: true,
      file_id,
      cleanup: { deleted: 2, failed: 0, timed_out: false, complete: true },
    });
    expect((await handler.getContext('default-agent')).context).toBe('');
    expect(handler.listFiles('default-agent')).toEqual({ files: [] });
  });

  it('validates uploads before storing anything', async () => {
    const { handler } = harness;
    const content = makeZip({ 'a.md': 'a' });

    await expect(
      handler.upload({ name: '', agentIds: ['default-agent'], filename: 'a.zip', content }),
    ).rejects.toThrow(new ValidationError('name is required'));
    await expect(handler.upload({ name: 'n', agentIds: [], filename: 'a.zip', content })).rejects.toThrow(
      new ValidationError('at least one agent ID is required'),
    );
    await expect(
      handler.upload({ name: 'n', agentIds: ['default-agent'], filename: 'a.tar.gz', content }),
    ).rejects.toThrow(new ValidationError('only ZIP files are supported'));
    expect(handler.listFiles()).toEqual({ files: [] });
  });

  it('lists files and agents', async () => {
    const { handler } = harness;
    await handler.createAgent({ id: 'b', name: 'B', description: 'second', tenant_id: 't' });
    const first = await handler.upload({
      name: 'one',
      agentIds: ['default-agent'],
      filename: 'one.zip',
      content: makeZip({ 'a.md': 'a' }),
    });
    const second = await handler.upload({
      name: 'two',
      agentIds: ['b'],
      filename: 'two.zip',
      content: makeZip({ 'a.md': 'a' }),
    });

    expect(handler.listFiles().files.map((f) => f.id)).toEqual([first.file_id, second.file_id]);
    expect(handler.listFiles('b').files.map((f) => f.id)).toEqual([second.file_id]);
    expect(handler.getFile(first.file_id).name).toBe('one');
    expect(handler.listAgents().agents.map((a) => a.id)).toEqual(['default-agent', 'b']);
    expect(handler.getAgent('b')).toMatchObject({ id: 'b', description: 'second', tenant_id: 't' });
    expect(handler.health()).toEqual({ status: 'ok', storage: harness.storage.kind, agents: 2, files: 2 });
  });

  it('reports unknown ids as not found', async () => {
    const { handler } = harness;

    expect(() => handler.getAgent('ghost')).toThrow(NotFoundError);
    expect(() => handler.getFile('ghost')).toThrow(NotFoundError);
    await expect(handler.deleteFile('ghost')).rejects.toBeInstanceOf(NotFoundError);
    await expect(handler.deleteFile(' ')).rejects.toThrow(new ValidationError('file ID is required'));
  });
});
