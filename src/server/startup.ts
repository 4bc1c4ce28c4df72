/**
 * Shared Startup Validation
 *
 * Validates startup dependencies and applies environment-driven config.
 * Used by both src/index.ts (stdio) and src/bin-http.ts (HTTP entry).
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import Database from 'better-sqlite3';
import { accessSync, constants, mkdirSync } from 'fs';
import { loadSqliteVec } from '../services/storage/schema.js';
import { getConfig, updateConfig } from './state.js';
import type { ServerConfig } from './types.js';

export interface SqliteVecStatus {
  available: boolean;
  version: string | null;
  error: string | null;
}

export interface StartupStatus {
  sqliteVec: SqliteVecStatus;
  indexRootWritable: boolean;
  warnings: string[];
  checkedAt: string;
}

let _startupStatus: StartupStatus | null = null;

/**
 * Result of the last validateStartupDependencies() run, for the health check
 */
export function getStartupStatus(): StartupStatus | null {
  return _startupStatus;
}

/**
 * Load sqlite-vec into a throwaway in-memory database
 */
export function checkSqliteVec(): SqliteVecStatus {
  const db = new Database(':memory:');
  try {
    loadSqliteVec(db);
    const row = db.prepare<[], { version: string }>('SELECT vec_version() AS version').get();
    return { available: true, version: row?.version ?? null, error: null };
  } catch (error) {
    return {
      available: false,
      version: null,
      error: error instanceof Error ? error.message : String(error),
    };
  } finally {
    db.close();
  }
}

/**
 * Create the index root if needed and check it is writable
 */
export function checkIndexRootWritable(indexRoot: string): boolean {
  try {
    mkdirSync(indexRoot, { recursive: true });
    accessSync(indexRoot, constants.W_OK);
    return true;
  } catch (error) {
    console.error(`[Config] Index root not writable: ${indexRoot}: ${String(error)}`);
    return false;
  }
}

function readNonNegativeInt(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0) {
    console.error(`[Config] Ignoring ${name}=${raw}: expected a non-negative integer`);
    return undefined;
  }
  return parsed;
}

/**
 * Config overrides from DOCCHAT_* environment variables. Invalid values are
 * reported and ignored.
 */
export function readEnvOverrides(): Partial<ServerConfig> {
  const overrides: Partial<ServerConfig> = {};

  const provider = process.env.DOCCHAT_EMBEDDING_PROVIDER;
  if (provider === 'ollama' || provider === 'hashing') {
    overrides.embeddingProvider = provider;
  } else if (provider) {
    console.error(`[Config] Ignoring DOCCHAT_EMBEDDING_PROVIDER=${provider}: expected ollama or hashing`);
  }

  const historyStore = process.env.DOCCHAT_HISTORY_STORE;
  if (historyStore === 'memory' || historyStore === 'sqlite') {
    overrides.historyStore = historyStore;
  } else if (historyStore) {
    console.error(`[Config] Ignoring DOCCHAT_HISTORY_STORE=${historyStore}: expected memory or sqlite`);
  }

  const chunkSize = readNonNegativeInt('DOCCHAT_CHUNK_SIZE');
  if (chunkSize !== undefined) overrides.chunkSize = chunkSize;
  const chunkOverlap = readNonNegativeInt('DOCCHAT_CHUNK_OVERLAP');
  if (chunkOverlap !== undefined) overrides.chunkOverlap = chunkOverlap;
  const timeout = readNonNegativeInt('DOCCHAT_PROVIDER_TIMEOUT_MS');
  if (timeout !== undefined) overrides.providerTimeoutMs = timeout;

  return overrides;
}

/**
 * Validate startup dependencies and apply environment-driven config overrides.
 * Warnings only: a missing extension or unwritable directory fails the tools
 * that need it, not the whole server.
 */
export function validateStartupDependencies(): StartupStatus {
  const overrides = readEnvOverrides();
  if (Object.keys(overrides).length > 0) {
    updateConfig(overrides);
    for (const [key, value] of Object.entries(overrides)) {
      console.error(`[Config] ${key}=${String(value)}`);
    }
  }

  const config = getConfig();
  const warnings: string[] = [];

  const sqliteVec = checkSqliteVec();
  if (!sqliteVec.available) {
    warnings.push(
      `sqlite-vec could not be loaded (${sqliteVec.error ?? 'unknown error'}). Uploads and chat will fail.`
    );
  }

  const indexRootWritable = checkIndexRootWritable(config.indexRoot);
  if (!indexRootWritable) {
    warnings.push(
      `Index root ${config.indexRoot} is not writable. Set DOCCHAT_INDEX_PATH to a writable directory.`
    );
  }

  if (config.embeddingProvider === 'hashing') {
    warnings.push('Embedding provider is "hashing" (lexical, offline). Set DOCCHAT_EMBEDDING_PROVIDER=ollama for semantic search.');
  }

  if (warnings.length > 0) {
    console.error('=== STARTUP WARNINGS ===');
    for (const w of warnings) {
      console.error(`  - ${w}`);
    }
    console.error('========================');
  }

  _startupStatus = {
    sqliteVec,
    indexRootWritable,
    warnings,
    checkedAt: new Date().toISOString(),
  };
  return _startupStatus;
}
