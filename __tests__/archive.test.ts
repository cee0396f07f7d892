import path from 'path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  DirectorySink,
  ExtractionSink,
  extractArchive,
  isMarkdownPath,
  normalizeEntryName,
} from '../src/services/knowledge/archive';
import { InvalidArchiveEntryError, StorageWriteError, ValidationError } from '../src/services/knowledge/errors';
import { makeTempDir, makeZip } from './helpers';

describe('normalizeEntryName', () => {
  it('keeps ordinary relative names', () => {
    expect(normalizeEntryName('docs/guide.md')).toBe('docs/guide.md');
    expect(normalizeEntryName('docs/./guide.md')).toBe('docs/guide.md');
    expect(normalizeEntryName('docs\\nested\\guide.md')).toBe('docs/nested/guide.md');
    expect(normalizeEntryName('docs/')).toBe('docs');
    expect(normalizeEntryName('./')).toBe('');
  });

  it.each(['../evil.md', 'docs/../../evil.md', '..\\evil.md', '/etc/passwd', 'C:/windows/evil.md', 'a\0b.md'])(
    'rejects %j',
    (name) => {
      expect(() => normalizeEntryName(name)).toThrow(InvalidArchiveEntryError);
    },
  );
});

describe('isMarkdownPath', () => {
  it('matches .md and .markdown case-insensitively', () => {
    expect(isMarkdownPath('a/b.md')).toBe(true);
    expect(isMarkdownPath('README.MD')).toBe(true);
    expect(isMarkdownPath('notes.markdown')).toBe(true);
    expect(isMarkdownPath('notes.txt')).toBe(false);
    expect(isMarkdownPath('md')).toBe(false);
  });
});

describe('extractArchive', () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(tmp);
  });

  it('extracts files and reports counts and sizes', async () => {
    const zip = makeZip({
      'docs/': '',
      'docs/a.md': '# A',
      'docs/b.txt': 'hello',
      'c.markdown': 'xy',
    });
    const out = path.join(tmp, 'out');

    const result = await extractArchive(zip, new DirectorySink(out));

    expect(result).toEqual({ success: true, files_extracted: 3, markdown_files: 2, total_size_bytes: 10 });
    expect(await fs.readFile(path.join(out, 'docs/a.md'), 'utf-8')).toBe('# A');
    expect(await fs.readFile(path.join(out, 'docs/b.txt'), 'utf-8')).toBe('hello');
    expect(await fs.readFile(path.join(out, 'c.markdown'), 'utf-8')).toBe('xy');
  });

  it('reads the archive from a path as well as a buffer', async () => {
    const archivePath = path.join(tmp, 'content.zip');
    await fs.writeFile(archivePath, makeZip({ 'one.md': 'one' }));

    const result = await extractArchive(archivePath, new DirectorySink(path.join(tmp, 'out')));

    expect(result.files_extracted).toBe(1);
    expect(result.total_size_bytes).toBe(3);
  });

  it('rejects a traversal entry before writing anything', async () => {
    const zip = makeZip({ 'good.md': 'fine', '../evil.md': 'bad' });
    const out = path.join(tmp, 'nested', 'out');

    const result = await extractArchive(zip, new DirectorySink(out));

    expect(result.success).toBe(false);
    expect(result.error).toBeInstanceOf(InvalidArchiveEntryError);
    expect(result.error?.message).toBe('invalid file path in archive: ../evil.md');
    expect(result.files_extracted).toBe(0);
    expect(await fs.pathExists(out)).toBe(false);
    expect(await fs.pathExists(path.join(tmp, 'nested', 'evil.md'))).toBe(false);
  });

  it('rejects an entry that climbs out through a nested directory', async () => {
    const zip = makeZip({ 'a/ok.md': 'fine', 'a/../../x.md': 'bad' });
    const out = path.join(tmp, 'nested', 'out');

    const result = await extractArchive(zip, new DirectorySink(out));

    expect(result.success).toBe(false);
    expect(result.error?.message).toBe('invalid file path in archive: a/../../x.md');
    expect(await fs.pathExists(out)).toBe(false);
    expect(await fs.pathExists(path.join(tmp, 'nested', 'x.md'))).toBe(false);
  });

  it('reports bytes that are not a zip archive as a validation failure', async () => {
    const result = await extractArchive(Buffer.from('definitely not a zip'), new DirectorySink(path.join(tmp, 'out')));

    expect(result.success).toBe(false);
    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.files_extracted).toBe(0);
  });

  it('stops at the first failed write and keeps the partial count', async () => {
    const written: string[] = [];
    const sink: ExtractionSink = {
      location: 'memory',
      async writeEntry(relativePath) {
        if (written.length === 1) throw new Error('disk full');
        written.push(relativePath);
      },
    };

    const result = await extractArchive(makeZip({ 'a.md': 'aa', 'b.md': 'bb', 'c.md': 'cc' }), sink);

    expect(written).toEqual(['a.md']);
    expect(result.success).toBe(false);
    expect(result.error).toBeInstanceOf(StorageWriteError);
    expect(result.error?.message).toBe('failed to extract b.md: disk full');
    expect(result.files_extracted).toBe(1);
    expect(result.markdown_files).toBe(1);
    expect(result.total_size_bytes).toBe(2);
  });

  it('succeeds with zero counts for an archive holding only directories', async () => {
    const result = await extractArchive(makeZip({ 'empty/': '' }), new DirectorySink(path.join(tmp, 'out')));

    expect(result).toEqual({ success: true, files_extracted: 0, markdown_files: 0, total_size_bytes: 0 });
    expect(await fs.pathExists(path.join(tmp, 'out', 'empty'))).toBe(true);
  });
});
