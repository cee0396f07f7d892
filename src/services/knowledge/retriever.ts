import logger from '../../utils/logger';
import { DEFAULT_CHARS_PER_TOKEN, estimateTokens } from '../../utils/tokens';
import { isMarkdownPath } from './archive';
import { describeError } from './errors';
import type { StorageBackend } from './types';

const log = logger.child({ module: 'Retriever' });

export const DEFAULT_MAX_TOKENS = 50_000;

export const CONTEXT_HEADER = '# Knowledge Base\n\n';

export interface TokenBudget {
  maxTokens: number;
  charsPerToken: number;
}

export type ContextState = 'empty' | 'complete' | 'truncated';

export interface KnowledgeContext {
  context: string;
  state: ContextState;
  /** Documents that made it into `context`. */
  included: number;
  total: number;
  estimated_tokens: number;
}

const DOCUMENT_FOOTER = '\n\n---\n\n';

function documentHeader(index: number): string {
  return `## Document ${index}\n\n`;
}

export function documentSection(index: number, body: string): string {
  return documentHeader(index) + body + DOCUMENT_FOOTER;
}

export function omittedNote(count: number): string {
  return `\n\n*Note: ${count} additional documents were omitted due to token limits.*\n`;
}

/**
 * Concatenates documents in order until the next one would push the estimate
 * past `budget.maxTokens`, then notes how many were left out.
 */
export function buildKnowledgeContext(documents: readonly string[], budget: TokenBudget): KnowledgeContext {
  const total = documents.length;
  if (total === 0) {
    return { context: '', state: 'empty', included: 0, total, estimated_tokens: 0 };
  }

  let context = CONTEXT_HEADER;
  let tokens = estimateTokens(CONTEXT_HEADER, budget.charsPerToken);

  for (let i = 0; i < total; i++) {
    const header = documentHeader(i + 1);
    // Each piece is rounded on its own
    const cost =
      estimateTokens(header, budget.charsPerToken) +
      estimateTokens(documents[i], budget.charsPerToken) +
      estimateTokens(DOCUMENT_FOOTER, budget.charsPerToken);
    if (tokens + cost > budget.maxTokens) {
      context += omittedNote(total - i);
      return { context, state: 'truncated', included: i, total, estimated_tokens: tokens };
    }
    context += documentSection(i + 1, documents[i]);
    tokens += cost;
  }

  return { context, state: 'complete', included: total, total, estimated_tokens: tokens };
}

export interface RetrieverOptions {
  maxTokens?: number;
  charsPerToken?: number;
}

/**
 * Loads an agent's markdown documents from storage and caches them per agent.
 * Callers that change an agent's files must invalidate through
 * `clearAgentCache` or `clearCache`.
 */
export class KnowledgeRetriever {
  private readonly cache = new Map<string, string[]>();
  private readonly inFlight = new Map<string, Promise<string[]>>();
  // Bumped on every invalidation; a load started under an older generation is not cached
  private generation = 0;
  private readonly budget: TokenBudget;

  constructor(private readonly storage: StorageBackend, options: RetrieverOptions = {}) {
    this.budget = {
      maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      charsPerToken: options.charsPerToken ?? DEFAULT_CHARS_PER_TOKEN,
    };
  }

  async getKnowledgeForAgent(agentId: string): Promise<string[]> {
    const cached = this.cache.get(agentId);
    if (cached) {
      log.debug({ agent_id: agentId, document_count: cached.length }, 'Using cached knowledge for agent');
      return [...cached];
    }

    let pending = this.inFlight.get(agentId);
    if (!pending) {
      const started = this.load(agentId, this.generation).finally(() => {
        if (this.inFlight.get(agentId) === started) this.inFlight.delete(agentId);
      });
      this.inFlight.set(agentId, started);
      pending = started;
    }
    return [...(await pending)];
  }

  private async load(agentId: string, generation: number): Promise<string[]> {
    const files = this.storage.getKnowledgeFilesForAgent(agentId);
    log.info({ agent_id: agentId, file_count: files.length }, 'Loading knowledge files for agent');

    const documents: string[] = [];
    for (const file of files) {
      let paths: string[];
      try {
        paths = await this.storage.listDocuments(file);
      } catch (err) {
        log.error({ file_id: file.id, error: describeError(err) }, 'Failed to list knowledge documents');
        continue;
      }

      for (const relativePath of paths.filter(isMarkdownPath)) {
        try {
          documents.push(await this.storage.readDocument(file, relativePath));
        } catch (err) {
          log.error({ file_id: file.id, path: relativePath, error: describeError(err) }, 'Failed to read knowledge document');
        }
      }
    }

    if (generation === this.generation) {
      this.cache.set(agentId, documents);
    }
    log.info({ agent_id: agentId, document_count: documents.length }, 'Loaded knowledge documents for agent');
    return documents;
  }

  clearCache(): void {
    this.generation++;
    this.cache.clear();
    this.inFlight.clear();
    log.info('Cleared knowledge cache');
  }

  clearAgentCache(agentId: string): void {
    this.generation++;
    this.cache.delete(agentId);
    this.inFlight.delete(agentId);
    log.info({ agent_id: agentId }, 'Cleared knowledge cache for agent');
  }

  async buildContext(agentId: string): Promise<KnowledgeContext> {
    const documents = await this.getKnowledgeForAgent(agentId);
    const result = buildKnowledgeContext(documents, this.budget);
    if (result.state === 'truncated') {
      log.warn(
        { agent_id: agentId, included: result.included, total: result.total, max_tokens: this.budget.maxTokens },
        'Token limit reached, truncating knowledge context',
      );
    }
    return result;
  }

  /** The formatted knowledge block for an agent's prompt; empty when it has no documents. */
  async getKnowledgeContext(agentId: string): Promise<string> {
    return (await this.buildContext(agentId)).context;
  }
}
