import AdmZip from 'adm-zip';
import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import type { ObjectStore } from '../src/services/knowledge/object_store';
import type { AgentSeed } from '../src/services/knowledge/registry';

export const TEST_SEED: AgentSeed = {
  id: 'default-agent',
  name: 'Default Agent',
  description: 'Default agent seeded on first start',
  tenant_id: 'default',
};

/**
 * Builds a zip in memory; names ending in "/" become directory entries.
 *
 * adm-zip strips ".." segments from names it writes, so such names are stored
 * under a same-length stand-in and patched back into both headers afterwards.
 * The CRC covers only the data, so the archive stays valid.
 */
export function makeZip(entries: Record<string, string>): Buffer {
  const zip = new AdmZip();
  const rawNames = new Map<string, string>();
  for (const [name, content] of Object.entries(entries)) {
    const stored = name.replace(/\.\./g, 'XX');
    if (stored !== name) rawNames.set(stored, name);
    zip.addFile(stored, Buffer.from(content, 'utf-8'));
  }

  const buffer = zip.toBuffer();
  for (const [stored, raw] of rawNames) {
    const needle = Buffer.from(stored, 'utf-8');
    const replacement = Buffer.from(raw, 'utf-8');
    for (let at = buffer.indexOf(needle); at !== -1; at = buffer.indexOf(needle, at + needle.length)) {
      replacement.copy(buffer, at);
    }
  }
  return buffer;
}

export async function makeTempDir(prefix = 'knowledge-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

type StoreOperation = 'ensureBucket' | 'put' | 'get' | 'list' | 'delete';

/**
 * Bucket held in a Map. `failOn` makes matching calls reject; `hang` makes
 * them never settle, which is how the tests drive deadlines.
 */
export class MemoryObjectStore implements ObjectStore {
  readonly bucketName = 'test-bucket';
  readonly objects = new Map<string, { data: Buffer; contentType: string }>();
  readonly calls: Record<StoreOperation, number> = { ensureBucket: 0, put: 0, get: 0, list: 0, delete: 0 };
  bucketExists = false;
  private readonly faults: { op: StoreOperation; match: (key: string) => boolean; mode: 'fail' | 'hang' }[] = [];

  failOn(op: StoreOperation, match: (key: string) => boolean = () => true): void {
    this.faults.push({ op, match, mode: 'fail' });
  }

  hangOn(op: StoreOperation, match: (key: string) => boolean = () => true): void {
    this.faults.push({ op, match, mode: 'hang' });
  }

  clearFaults(): void {
    this.faults.length = 0;
  }

  private async check(op: StoreOperation, key: string): Promise<void> {
    this.calls[op]++;
    const fault = this.faults.find((f) => f.op === op && f.match(key));
    if (!fault) return;
    if (fault.mode === 'hang') {
      return new Promise<void>(() => undefined);
    }
    throw new Error(`injected ${op} failure for ${key}`);
  }

  async ensureBucket(): Promise<void> {
    await this.check('ensureBucket', this.bucketName);
    this.bucketExists = true;
  }

  async putObject(key: string, data: Buffer, contentType: string): Promise<void> {
    await this.check('put', key);
    this.objects.set(key, { data: Buffer.from(data), contentType });
  }

  async getObject(key: string): Promise<Buffer | null> {
    await this.check('get', key);
    const entry = this.objects.get(key);
    return entry ? Buffer.from(entry.data) : null;
  }

  async *listObjects(prefix: string): AsyncIterable<string> {
    await this.check('list', prefix);
    const keys = [...this.objects.keys()].filter((key) => key.startsWith(prefix)).sort();
    for (const key of keys) {
      yield key;
    }
  }

  async deleteObject(key: string): Promise<void> {
    await this.check('delete', key);
    this.objects.delete(key);
  }

  keysUnder(prefix: string): string[] {
    return [...this.objects.keys()].filter((key) => key.startsWith(prefix)).sort();
  }
}
