/**
 * Shared Tool Utilities
 *
 * Response formatting and error handling shared by the tool modules.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/shared
 */

import { z } from 'zod';
import { MCPError, formatErrorResponse } from '../server/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** MCP tool response format */
export type ToolResponse = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

/** Tool handler function signature */
type ToolHandler = (params: Record<string, unknown>) => Promise<ToolResponse>;

/** Tool definition with description, schema, and handler */
export interface ToolDefinition {
  description: string;
  inputSchema: Record<string, z.ZodTypeAny>;
  handler: ToolHandler;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** Max response size in bytes before truncation (700KB) */
export const MAX_RESPONSE_BYTES = 700 * 1024;

/** Room left for the `_response_truncated` note */
const TRUNCATION_NOTE_BYTES = 1024;

const TRUNCATION_SUGGESTION =
  'Pass a smaller limit to rag_session_history, or drop old turns with rag_session_clear';

/**
 * Format tool result as MCP content response.
 * If the serialized JSON exceeds MAX_RESPONSE_BYTES, the largest arrays are
 * cut down to their most recent items and a `_response_truncated` note is
 * added so the client knows to ask for less.
 */
export function formatResponse(result: unknown): ToolResponse {
  const json = JSON.stringify(result, null, 2);
  if (json.length <= MAX_RESPONSE_BYTES || !isRecord(result)) {
    return { content: [{ type: 'text', text: json }] };
  }

  const truncated = truncateResult(result, MAX_RESPONSE_BYTES - TRUNCATION_NOTE_BYTES);
  const truncatedJson = JSON.stringify(truncated, null, 2);
  console.error(`[Response] Truncated ${json.length} bytes to ${truncatedJson.length}`);
  return { content: [{ type: 'text', text: truncatedJson }] };
}

interface ArrayRef {
  parent: Record<string, unknown>;
  key: string;
  path: string[];
  items: unknown[];
  bytes: number;
}

/**
 * Halve the largest arrays, keeping their tail (history is oldest first),
 * until the result fits. Each cut array gets a `_<key>_total` sibling.
 */
function truncateResult(obj: Record<string, unknown>, maxBytes: number): Record<string, unknown> {
  const parsed: unknown = JSON.parse(JSON.stringify(obj));
  const copy: Record<string, unknown> = isRecord(parsed) ? parsed : {};
  const sizeOf = (): number => JSON.stringify(copy, null, 2).length;

  const arrays: ArrayRef[] = [];
  collectArrays(copy, [], arrays);
  arrays.sort((a, b) => b.bytes - a.bytes);

  const truncatedFields: string[] = [];
  for (const ref of arrays) {
    if (sizeOf() <= maxBytes) break;

    const total = ref.items.length;
    let keep = total;
    while (keep > 1 && sizeOf() > maxBytes) {
      keep = Math.floor(keep / 2);
      ref.parent[ref.key] = ref.items.slice(total - keep);
    }
    if (keep < total) {
      ref.parent[`_${ref.key}_total`] = total;
      truncatedFields.push(`${ref.path.join('.')} (${total} → ${keep})`);
    }
  }

  if (sizeOf() > maxBytes) {
    return {
      success: copy.success,
      _response_truncated: {
        reason: `Response exceeded ${Math.round(MAX_RESPONSE_BYTES / 1024)}KB limit and could not be reduced by array truncation`,
        original_size_bytes: JSON.stringify(obj, null, 2).length,
        suggestion: TRUNCATION_SUGGESTION,
      },
    };
  }

  copy._response_truncated = {
    reason: `Response exceeded ${Math.round(MAX_RESPONSE_BYTES / 1024)}KB limit`,
    truncated_fields: truncatedFields,
    suggestion: TRUNCATION_SUGGESTION,
  };
  return copy;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function collectArrays(obj: Record<string, unknown>, path: string[], result: ArrayRef[]): void {
  for (const [key, value] of Object.entries(obj)) {
    if (Array.isArray(value)) {
      result.push({ parent: obj, key, path: [...path, key], items: value, bytes: JSON.stringify(value).length });
    } else if (isRecord(value)) {
      collectArrays(value, [...path, key], result);
    }
  }
}

/**
 * Handle errors uniformly - FAIL FAST
 */
export function handleError(error: unknown): ToolResponse {
  const mcpError = MCPError.fromUnknown(error);
  console.error(`[ERROR] ${mcpError.category}: ${mcpError.message}`);
  return {
    content: [{ type: 'text', text: JSON.stringify(formatErrorResponse(mcpError), null, 2) }],
    isError: true,
  };
}
