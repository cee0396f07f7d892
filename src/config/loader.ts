import fs from 'fs-extra';
import path from 'path';
import os from 'os';
import { Config, ConfigSchema } from './schema';
import logger from '../utils/logger';
import { getProjectRoot } from '../utils/paths';

const log = logger.child({ module: 'Config' });

type RawConfig = Record<string, unknown>;

/** Environment variables that win over whatever the config file says. */
const ENV_OVERRIDES: ReadonlyArray<readonly [string, readonly string[]]> = [
  ['STORAGE_TYPE', ['storage', 'type']],
  ['LOCAL_STORAGE_PATH', ['storage', 'local_path']],
  ['GCS_STORAGE_BUCKET', ['storage', 'gcs', 'bucket']],
  ['GCP_PROJECT_ID', ['storage', 'gcs', 'project_id']],
  ['GCP_KEY_FILE', ['storage', 'gcs', 'key_file']],
  ['KNOWLEDGE_CACHE_DIR', ['storage', 'cache_dir']],
  ['KNOWLEDGE_MAX_TOKENS', ['retrieval', 'max_tokens']],
  ['PORT', ['server', 'port']],
  ['HOST', ['server', 'host']],
  ['ADMIN_TOKEN', ['server', 'admin_token']],
];

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setIn(target: RawConfig, keys: readonly string[], value: string): void {
  let node = target;
  for (const key of keys.slice(0, -1)) {
    const child = node[key];
    if (isRecord(child)) {
      node = child;
    } else {
      const created: RawConfig = {};
      node[key] = created;
      node = created;
    }
  }
  node[keys[keys.length - 1]] = value;
}

export function getConfigPaths(): string[] {
  return [
    path.join(process.cwd(), 'config.json'),
    path.join(getProjectRoot(), 'config.json'),
    path.join(os.homedir(), '.agent-knowledge', 'config.json'),
  ];
}

async function readConfigFile(paths: string[]): Promise<RawConfig> {
  for (const p of paths) {
    if (await fs.pathExists(p)) {
      try {
        const data: unknown = await fs.readJson(p);
        if (!isRecord(data)) {
          log.warn(`Ignoring config at ${p}: expected a JSON object`);
          continue;
        }
        log.info(`Loaded config from ${p}`);
        return data;
      } catch (err) {
        log.warn(`Failed to load config from ${p}: ${err}`);
      }
    }
  }
  log.info('Using default configuration');
  return {};
}

export function applyEnvOverrides(raw: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
  const merged = structuredClone(raw);
  for (const [name, keys] of ENV_OVERRIDES) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      setIn(merged, keys, value);
    }
  }
  return merged;
}

/**
 * Resolves configuration once: the first readable config.json, then
 * environment overrides, then schema defaults. Invalid values are fatal.
 */
export async function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): Promise<Config> {
  const paths = configPath ? [configPath] : getConfigPaths();
  const raw = applyEnvOverrides(await readConfigFile(paths), env);

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    log.error(`Config validation failed: ${parsed.error.message}`);
    throw new Error(`Invalid configuration: ${parsed.error.message}`);
  }
  return parsed.data;
}
