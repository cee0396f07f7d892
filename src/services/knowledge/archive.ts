import AdmZip from 'adm-zip';
import path from 'path';
import fs from 'fs-extra';
import logger from '../../utils/logger';
import {
  InvalidArchiveEntryError,
  KnowledgeError,
  StorageWriteError,
  ValidationError,
  describeError,
} from './errors';
import { ExtractionResult } from './types';

const log = logger.child({ module: 'Archive' });

export const ARCHIVE_EXTENSION = 'zip';

const MARKDOWN_EXTENSIONS = new Set(['.md', '.markdown']);

export function isMarkdownPath(filePath: string): boolean {
  return MARKDOWN_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

/**
 * Where extracted entries end up. Paths handed to a sink are already
 * validated, relative and forward-slashed.
 */
export interface ExtractionSink {
  readonly location: string;
  prepareDirectory?(relativePath: string): Promise<void>;
  writeEntry(relativePath: string, data: Buffer): Promise<void>;
}

/**
 * Turns a raw entry name into a safe relative path, or throws
 * InvalidArchiveEntryError for anything that could leave the destination root.
 * Returns '' for the archive root itself.
 */
export function normalizeEntryName(entryName: string): string {
  const unified = entryName.replace(/\\/g, '/');

  if (unified.includes('\0') || unified.startsWith('/') || /^[a-zA-Z]:/.test(unified)) {
    throw new InvalidArchiveEntryError(entryName);
  }
  if (unified.split('/').some((segment) => segment === '..')) {
    throw new InvalidArchiveEntryError(entryName);
  }

  const normalized = path.posix.normalize(unified).replace(/\/+$/, '');
  return normalized === '.' ? '' : normalized;
}

/** Writes entries under a local directory. */
export class DirectorySink implements ExtractionSink {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  get location(): string {
    return this.root;
  }

  private resolve(relativePath: string): string {
    const target = path.resolve(this.root, relativePath);
    if (target !== this.root && !target.startsWith(this.root + path.sep)) {
      throw new InvalidArchiveEntryError(relativePath);
    }
    return target;
  }

  async prepareDirectory(relativePath: string): Promise<void> {
    await fs.ensureDir(this.resolve(relativePath));
  }

  async writeEntry(relativePath: string, data: Buffer): Promise<void> {
    await fs.outputFile(this.resolve(relativePath), data);
  }
}

function failed(result: ExtractionResult, error: KnowledgeError): ExtractionResult {
  log.warn({ error: error.message, files_extracted: result.files_extracted }, 'Archive extraction failed');
  return { ...result, success: false, error };
}

/**
 * Unpacks a zip archive into `sink`.
 *
 * Every entry name is validated before the first byte is written, so a
 * traversal attempt leaves the destination untouched. Any later failure stops
 * the extraction; entries written up to that point are left where they are.
 */
export async function extractArchive(archive: Buffer | string, sink: ExtractionSink): Promise<ExtractionResult> {
  const result: ExtractionResult = {
    success: true,
    files_extracted: 0,
    markdown_files: 0,
    total_size_bytes: 0,
  };

  let entries: AdmZip.IZipEntry[];
  try {
    entries = new AdmZip(archive).getEntries();
  } catch (err) {
    return failed(result, new ValidationError(`failed to open zip archive: ${describeError(err)}`, { cause: err }));
  }

  const plan: { entry: AdmZip.IZipEntry; relativePath: string }[] = [];
  for (const entry of entries) {
    let relativePath: string;
    try {
      relativePath = normalizeEntryName(entry.entryName);
    } catch (err) {
      if (err instanceof KnowledgeError) return failed(result, err);
      throw err;
    }
    if (!relativePath) {
      if (entry.isDirectory) continue;
      return failed(result, new InvalidArchiveEntryError(entry.entryName));
    }
    plan.push({ entry, relativePath });
  }

  for (const { entry, relativePath } of plan) {
    if (entry.isDirectory) {
      try {
        await sink.prepareDirectory?.(relativePath);
      } catch (err) {
        return failed(result, asWriteError(err, `failed to create directory ${relativePath}`));
      }
      continue;
    }

    let data: Buffer;
    try {
      data = entry.getData();
    } catch (err) {
      return failed(result, new ValidationError(`failed to read archive entry ${entry.entryName}: ${describeError(err)}`, { cause: err }));
    }

    try {
      await sink.writeEntry(relativePath, data);
    } catch (err) {
      return failed(result, asWriteError(err, `failed to extract ${relativePath}`));
    }

    result.files_extracted++;
    result.total_size_bytes += data.length;
    if (isMarkdownPath(relativePath)) {
      result.markdown_files++;
    }
  }

  log.debug({ location: sink.location, ...result }, 'Archive extracted');
  return result;
}

function asWriteError(err: unknown, message: string): KnowledgeError {
  if (err instanceof KnowledgeError) return err;
  return new StorageWriteError(`${message}: ${describeError(err)}`, { cause: err });
}
