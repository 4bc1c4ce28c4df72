/**
 * Configuration Management MCP Tools
 *
 * Tools: rag_config_get, rag_config_set
 *
 * Values live in server state for the life of the process. Changing
 * embedding_provider or history_store rebuilds the affected service on
 * its next use.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/config
 */

import { z } from 'zod';
import { getConfig, updateConfig } from '../server/state.js';
import { successResult, type ServerConfig } from '../server/types.js';
import { validateInput, ConfigGetInput, ConfigSetInput, ConfigKey } from '../utils/validation.js';
import { validationError } from '../server/errors.js';
import { validateSplitterConfig } from '../services/chunking/splitter.js';
import { validateMmrParams } from '../services/search/mmr.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

type ConfigKeyName = z.infer<typeof ConfigKey>;
type ConfigValue = string | number | boolean;

// ═══════════════════════════════════════════════════════════════════════════════
// KEY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

function getConfigValue(config: ServerConfig, key: ConfigKeyName): ConfigValue {
  switch (key) {
    case 'chunk_size':
      return config.chunkSize;
    case 'chunk_overlap':
      return config.chunkOverlap;
    case 'k':
      return config.k;
    case 'fetch_k':
      return config.fetchK;
    case 'lambda_mult':
      return config.lambdaMult;
    case 'max_context_chars':
      return config.maxContextChars;
    case 'history_window':
      return config.historyWindow;
    case 'embedding_provider':
      return config.embeddingProvider;
    case 'history_store':
      return config.historyStore;
    case 'provider_timeout_ms':
      return config.providerTimeoutMs;
  }
}

function requireInteger(key: ConfigKeyName, value: ConfigValue, min: number, max: number): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    throw validationError(`${key} must be an integer between ${min} and ${max}`, { value });
  }
  return value;
}

/**
 * Validate one key/value pair and turn it into a config update.
 * Cross-field rules are checked against the rest of the current config.
 */
function toConfigUpdate(
  config: ServerConfig,
  key: ConfigKeyName,
  value: ConfigValue
): Partial<ServerConfig> {
  switch (key) {
    case 'chunk_size': {
      const chunkSize = requireInteger(key, value, 1, 100000);
      validateSplitterConfig({ chunkSize, chunkOverlap: config.chunkOverlap });
      return { chunkSize };
    }
    case 'chunk_overlap': {
      const chunkOverlap = requireInteger(key, value, 1, 100000);
      validateSplitterConfig({ chunkSize: config.chunkSize, chunkOverlap });
      return { chunkOverlap };
    }
    case 'k': {
      const k = requireInteger(key, value, 1, 100);
      validateMmrParams(k, config.fetchK, config.lambdaMult);
      return { k };
    }
    case 'fetch_k': {
      const fetchK = requireInteger(key, value, 1, 1000);
      validateMmrParams(config.k, fetchK, config.lambdaMult);
      return { fetchK };
    }
    case 'lambda_mult': {
      if (typeof value !== 'number') {
        throw validationError('lambda_mult must be a number between 0 and 1', { value });
      }
      validateMmrParams(config.k, config.fetchK, value);
      return { lambdaMult: value };
    }
    case 'max_context_chars':
      return { maxContextChars: requireInteger(key, value, 100, 1000000) };
    case 'history_window':
      return { historyWindow: requireInteger(key, value, 0, 100) };
    case 'embedding_provider':
      if (value !== 'ollama' && value !== 'hashing') {
        throw validationError('embedding_provider must be "ollama" or "hashing"', { value });
      }
      return { embeddingProvider: value };
    case 'history_store':
      if (value !== 'memory' && value !== 'sqlite') {
        throw validationError('history_store must be "memory" or "sqlite"', { value });
      }
      return { historyStore: value };
    case 'provider_timeout_ms':
      return { providerTimeoutMs: requireInteger(key, value, 0, 3600000) };
  }
}

const configNextSteps = [
  { tool: 'rag_config_set', description: 'Change a configuration setting' },
  { tool: 'rag_health_check', description: 'Check provider and index status' },
];

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleConfigGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigGetInput, params);
    const config = getConfig();

    // Return specific key if requested
    if (input.key) {
      return formatResponse(
        successResult({
          key: input.key,
          value: getConfigValue(config, input.key),
          next_steps: configNextSteps,
        })
      );
    }

    const values: Record<string, ConfigValue> = {};
    for (const key of ConfigKey.options) {
      values[key] = getConfigValue(config, key);
    }

    return formatResponse(
      successResult({
        ...values,
        // Immutable values (informational only)
        index_root: config.indexRoot,
        fingerprint_algorithm: 'sha256',
        next_steps: configNextSteps,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleConfigSet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigSetInput, params);
    const config = getConfig();
    const previous = getConfigValue(config, input.key);

    updateConfig(toConfigUpdate(config, input.key, input.value));
    console.error(`[Config] ${input.key}: ${String(previous)} -> ${String(input.value)}`);

    return formatResponse(
      successResult({
        key: input.key,
        previous_value: previous,
        value: getConfigValue(getConfig(), input.key),
        updated: true,
        next_steps: configNextSteps,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Config tools collection for MCP server registration
 */
export const configTools: Record<string, ToolDefinition> = {
  rag_config_get: {
    description: 'Get the current server configuration, or one key of it.',
    inputSchema: ConfigGetInput.shape,
    handler: handleConfigGet,
  },
  rag_config_set: {
    description:
      'Set a configuration value (chunking, MMR parameters, context bounds, embedding provider, history store, provider timeout). Applies to later requests.',
    inputSchema: ConfigSetInput.shape,
    handler: handleConfigSet,
  },
};
