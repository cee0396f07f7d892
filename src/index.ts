/**
 * Knowledge engine entry point.
 *
 * Resolves configuration, opens the configured storage backend (local
 * directory or Cloud Storage bucket), wires the retriever and management
 * handler to it and serves the management API until SIGINT/SIGTERM.
 */

import { loadConfig } from './config/loader';
import { createStorageBackend } from './services/knowledge/factory';
import { KnowledgeRetriever } from './services/knowledge/retriever';
import { KnowledgeHandler } from './services/knowledge/handler';
import { KnowledgeServer } from './http/server';
import { getProjectRoot } from './utils/paths';
import logger from './utils/logger';

const log = logger.child({ module: 'System' });

async function main() {
  try {
    const config = await loadConfig();
    log.info(`Project Root locked at: ${getProjectRoot()}`);

    const storage = await createStorageBackend(config.storage, config.default_agent);
    log.info(`Knowledge storage initialized (${storage.kind})`);

    const retriever = new KnowledgeRetriever(storage, {
      maxTokens: config.retrieval.max_tokens,
      charsPerToken: config.retrieval.chars_per_token,
    });
    const handler = new KnowledgeHandler(storage, retriever);

    const server = new KnowledgeServer(handler, {
      port: config.server.port,
      host: config.server.host,
      maxUploadBytes: config.server.max_upload_bytes,
      adminToken: config.server.admin_token,
    });
    await server.start();

    let stopping = false;
    const shutdown = async (signal: string) => {
      if (stopping) return;
      stopping = true;
      log.info(`Received ${signal}. Shutting down...`);
      try {
        await server.stop();
        await storage.close();
        log.info('Shutdown complete.');
        process.exit(0);
      } catch (err) {
        log.error(`Error during shutdown: ${err}`);
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
  } catch (err) {
    log.error(`Fatal error: ${err}`);
    process.exit(1);
  }
}

void main();
