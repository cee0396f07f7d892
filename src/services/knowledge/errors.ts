export type KnowledgeErrorCode =
  | 'validation'
  | 'not_found'
  | 'already_exists'
  | 'invalid_archive_entry'
  | 'storage_write'
  | 'storage_read'
  | 'registry_persist'
  | 'registry_corrupt'
  | 'timeout'
  | 'unauthorized';

/**
 * Base class for every failure the engine reports to its callers.
 * `status` is the HTTP status the management surface answers with.
 */
export class KnowledgeError extends Error {
  readonly code: KnowledgeErrorCode;
  readonly status: number;

  constructor(code: KnowledgeErrorCode, status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

export class ValidationError extends KnowledgeError {
  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('validation', options?.status ?? 400, message, options);
  }
}

export class NotFoundError extends KnowledgeError {
  constructor(readonly resource: 'agent' | 'knowledge file', readonly id: string) {
    super('not_found', 404, `${resource} not found: ${id}`);
  }
}

export class AlreadyExistsError extends KnowledgeError {
  constructor(readonly resource: 'agent', readonly id: string) {
    super('already_exists', 409, `${resource} with ID ${id} already exists`);
  }
}

export class InvalidArchiveEntryError extends KnowledgeError {
  constructor(readonly entryName: string) {
    super('invalid_archive_entry', 400, `invalid file path in archive: ${entryName}`);
  }
}

export class StorageWriteError extends KnowledgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('storage_write', 500, message, options);
  }
}

export class StorageReadError extends KnowledgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('storage_read', 500, message, options);
  }
}

export class RegistryPersistError extends KnowledgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('registry_persist', 500, message, options);
  }
}

export class RegistryCorruptError extends KnowledgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('registry_corrupt', 500, message, options);
  }
}

export class TimeoutError extends KnowledgeError {
  constructor(readonly operation: string, options?: { cause?: unknown }) {
    super('timeout', 504, `operation timed out: ${operation}`, options);
  }
}

export class UnauthorizedError extends KnowledgeError {
  constructor(message: string, status: 401 | 403 = 401) {
    super('unauthorized', status, message);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
