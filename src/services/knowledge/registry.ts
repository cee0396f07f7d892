import fs from 'fs-extra';
import { Mutex } from 'async-mutex';
import { v4 as uuidv4 } from 'uuid';
import logger from '../../utils/logger';
import {
  AlreadyExistsError,
  KnowledgeError,
  NotFoundError,
  RegistryCorruptError,
  RegistryPersistError,
  StorageReadError,
  ValidationError,
  describeError,
} from './errors';
import { ensureActive } from './deadline';
import { Agent, KnowledgeFile, PublicAgent, RegistryData, RegistrySchema } from './types';

const log = logger.child({ module: 'Registry' });

export const REGISTRY_KEY = 'registry.json';

/** Durable home of the serialized registry: a local file or a bucket object. */
export interface RegistryPersistence {
  readonly location: string;
  /** Resolves null when nothing has been persisted yet. */
  load(): Promise<string | null>;
  save(serialized: string): Promise<void>;
}

export class FileRegistryPersistence implements RegistryPersistence {
  constructor(readonly location: string) {}

  async load(): Promise<string | null> {
    if (!(await fs.pathExists(this.location))) return null;
    return fs.readFile(this.location, 'utf-8');
  }

  async save(serialized: string): Promise<void> {
    // Readers of the file never observe a half-written registry
    const tmpPath = `${this.location}.tmp`;
    await fs.outputFile(tmpPath, serialized, 'utf-8');
    await fs.move(tmpPath, this.location, { overwrite: true });
  }
}

export interface AgentSeed {
  id: string;
  name: string;
  description: string;
  tenant_id: string;
}

export function toPublicAgent(agent: Agent): PublicAgent {
  const { api_key: _apiKey, ...visible } = agent;
  return { ...visible };
}

export function generateApiKey(): string {
  return uuidv4();
}

function parseRegistry(raw: string, location: string): RegistryData {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new RegistryCorruptError(`failed to parse registry at ${location}: ${describeError(err)}`, { cause: err });
  }
  const parsed = RegistrySchema.safeParse(json);
  if (!parsed.success) {
    throw new RegistryCorruptError(`invalid registry at ${location}: ${parsed.error.message}`, { cause: parsed.error });
  }
  return parsed.data;
}

/**
 * In-memory registry of agents and knowledge files, persisted write-through.
 *
 * Mutations are serialized by one mutex and applied to a draft copy; the draft
 * only becomes visible after it has been persisted. Queries read the committed
 * snapshot and hand out copies, so callers can never alter registry state.
 */
export class KnowledgeRegistry {
  private state: RegistryData;
  private readonly writeLock = new Mutex();

  private constructor(private readonly persistence: RegistryPersistence, state: RegistryData) {
    this.state = state;
  }

  /**
   * Loads the persisted registry, or seeds and persists one holding only the
   * default agent when none exists. Unreadable or malformed data is fatal.
   */
  static async open(persistence: RegistryPersistence, seed: AgentSeed): Promise<KnowledgeRegistry> {
    let raw: string | null;
    try {
      raw = await persistence.load();
    } catch (err) {
      if (err instanceof KnowledgeError) throw err;
      throw new StorageReadError(`failed to read registry at ${persistence.location}: ${describeError(err)}`, { cause: err });
    }

    if (raw !== null) {
      const data = parseRegistry(raw, persistence.location);
      log.info(
        { location: persistence.location, agents: data.agents.length, files: data.knowledge_files.length },
        'Registry loaded',
      );
      return new KnowledgeRegistry(persistence, data);
    }

    log.info({ location: persistence.location, agent_id: seed.id }, 'Registry does not exist, creating default registry');
    const registry = new KnowledgeRegistry(persistence, { agents: [], knowledge_files: [] });
    await registry.update((draft) => {
      draft.agents.push({
        ...seed,
        api_key: generateApiKey(),
        created_at: new Date().toISOString(),
      });
    });
    return registry;
  }

  // --- Queries ---

  listAgents(): PublicAgent[] {
    return this.state.agents.map(toPublicAgent);
  }

  findAgent(agentId: string): PublicAgent | undefined {
    const agent = this.state.agents.find((a) => a.id === agentId);
    return agent ? toPublicAgent(agent) : undefined;
  }

  listFiles(): KnowledgeFile[] {
    return structuredClone(this.state.knowledge_files);
  }

  findFile(fileId: string): KnowledgeFile | undefined {
    const file = this.state.knowledge_files.find((f) => f.id === fileId);
    return file ? structuredClone(file) : undefined;
  }

  filesForAgent(agentId: string): KnowledgeFile[] {
    return structuredClone(this.state.knowledge_files.filter((f) => f.agent_ids.includes(agentId)));
  }

  // --- Mutations ---

  async addAgent(agent: Agent, signal?: AbortSignal): Promise<PublicAgent> {
    return this.update((draft) => {
      if (draft.agents.some((a) => a.id === agent.id)) {
        throw new AlreadyExistsError('agent', agent.id);
      }
      draft.agents.push({ ...agent });
      return toPublicAgent(agent);
    }, signal);
  }

  /** Appends a file record; every agent it names must already exist. */
  async addFile(file: KnowledgeFile, signal?: AbortSignal): Promise<KnowledgeFile> {
    return this.update((draft) => {
      if (file.agent_ids.length === 0) {
        throw new ValidationError('at least one agent ID is required');
      }
      const known = new Set(draft.agents.map((a) => a.id));
      const unknown = file.agent_ids.filter((id) => !known.has(id));
      if (unknown.length > 0) {
        throw new ValidationError(`unknown agent IDs: ${unknown.join(', ')}`);
      }
      draft.knowledge_files.push(structuredClone(file));
      return structuredClone(file);
    }, signal);
  }

  async removeFile(fileId: string, signal?: AbortSignal): Promise<KnowledgeFile> {
    return this.update((draft) => {
      const index = draft.knowledge_files.findIndex((f) => f.id === fileId);
      if (index === -1) {
        throw new NotFoundError('knowledge file', fileId);
      }
      const [removed] = draft.knowledge_files.splice(index, 1);
      return removed;
    }, signal);
  }

  /**
   * Runs `mutate` against a draft under the write lock, persists the draft,
   * then commits it. If `mutate` throws or persisting fails, nothing changes.
   */
  async update<T>(mutate: (draft: RegistryData) => T, signal?: AbortSignal): Promise<T> {
    return this.writeLock.runExclusive(async () => {
      ensureActive(signal, 'registry update');

      const draft = structuredClone(this.state);
      const result = mutate(draft);

      try {
        await this.persistence.save(JSON.stringify(draft, null, 2));
      } catch (err) {
        log.error({ location: this.persistence.location, error: describeError(err) }, 'Failed to save registry');
        throw new RegistryPersistError(`failed to save registry: ${describeError(err)}`, { cause: err });
      }

      this.state = draft;
      return result;
    });
  }
}
