#!/usr/bin/env node
/**
 * Document Chat MCP Server - Unified Entry Point
 *
 * Transport selection via MCP_TRANSPORT environment variable:
 *   - (unset or "stdio") -> stdio transport (default)
 *   - "http"             -> Streamable HTTP transport
 *
 * Environment variables:
 *   MCP_TRANSPORT              - Transport mode: "stdio" (default) or "http"
 *   MCP_HTTP_PORT              - Port for HTTP mode (default: 3100)
 *   MCP_SESSION_TTL            - MCP session TTL in seconds for HTTP mode (default: 3600)
 *   DOCCHAT_INDEX_PATH         - Override default index root
 *   OLLAMA_BASE_URL            - Ollama server (default: http://localhost:11434)
 *
 * MCP sessions (one per connected client) are unrelated to document chat
 * sessions: any client may use any chat session id.
 *
 * CRITICAL: In stdio mode, NEVER use console.log() - stdout is reserved for JSON-RPC.
 * Use console.error() for all logging in both modes.
 *
 * @module bin-http
 */

import './server/env.js';

import http from 'http';
import { randomUUID } from 'crypto';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { registerAllTools, getToolCount } from './server/register-tools.js';
import { getStartupStatus, validateStartupDependencies } from './server/startup.js';
import { getConfig } from './server/state.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

const TRANSPORT = (process.env.MCP_TRANSPORT || 'stdio').toLowerCase();
const PORT = (() => {
  const raw = Number(process.env.MCP_HTTP_PORT);
  return Number.isFinite(raw) && raw > 0 && raw < 65536 ? raw : 3100;
})();
const SESSION_TTL_S = (() => {
  const raw = Number(process.env.MCP_SESSION_TTL);
  return Number.isFinite(raw) && raw > 0 ? raw : 3600;
})();

function createServer(): McpServer {
  return new McpServer({
    name: 'docchat-mcp',
    version: '0.1.0',
  });
}

function logCloseError(what: string): (error: unknown) => void {
  return (error) => {
    console.error(
      `[HTTP] Failed to close ${what}: ${error instanceof Error ? error.message : String(error)}`
    );
  };
}

// =============================================================================
// STDIO MODE
// =============================================================================

async function startStdio(): Promise<void> {
  const server = createServer();
  const toolCount = registerAllTools(server);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`Document Chat MCP Server running on stdio`);
  console.error(`Tools registered: ${toolCount}`);

  function handleShutdown(signal: string): void {
    console.error(`[Shutdown] Received ${signal}, shutting down gracefully...`);
    server
      .close()
      .then(() => {
        console.error('[Shutdown] Server closed successfully');
        process.exit(0);
      })
      .catch((err) => {
        console.error(`[Shutdown] Error closing server: ${String(err)}`);
        process.exit(1);
      });
    setTimeout(() => {
      console.error('[Shutdown] Forced exit after timeout');
      process.exit(1);
    }, 5000).unref();
  }

  process.on('SIGTERM', () => handleShutdown('SIGTERM'));
  process.on('SIGINT', () => handleShutdown('SIGINT'));
}

// =============================================================================
// HTTP MODE
//
// One StreamableHTTPServerTransport + one McpServer per MCP session; the
// session is registered when the SDK reports it initialized and looked up
// by the Mcp-Session-Id header afterwards.
// =============================================================================

/** Tracked MCP session: transport + server + activity timestamp for TTL */
interface SessionEntry {
  transport: StreamableHTTPServerTransport;
  server: McpServer;
  lastActivity: number;
}

const sessions = new Map<string, SessionEntry>();

function createSessionEntry(): SessionEntry {
  const server = createServer();
  registerAllTools(server);

  const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
    sessionIdGenerator: () => randomUUID(),
    onsessioninitialized: (sessionId: string) => {
      console.error(`[HTTP] Session initialized: ${sessionId}`);
      sessions.set(sessionId, entry);
    },
  });

  // Clean up session when transport closes (e.g., DELETE request)
  transport.onclose = () => {
    const sid = transport.sessionId;
    if (sid && sessions.has(sid)) {
      console.error(`[HTTP] Transport closed for session ${sid}`);
      sessions.delete(sid);
    }
  };

  const entry: SessionEntry = { transport, server, lastActivity: Date.now() };
  return entry;
}

function healthPayload(toolCount: number): { status: number; body: Record<string, unknown> } {
  const startup = getStartupStatus();
  const sqliteVecOk = startup?.sqliteVec.available ?? false;
  const indexRootOk = startup?.indexRootWritable ?? false;
  const checks = {
    transport: 'ok',
    tools: toolCount > 0 ? 'ok' : 'error',
    tools_count: toolCount,
    sqlite_vec: sqliteVecOk ? 'ok' : 'error',
    index_root: indexRootOk ? 'ok' : 'error',
    index_root_path: getConfig().indexRoot,
    mcp_sessions: sessions.size,
  };
  const healthy = toolCount > 0 && sqliteVecOk && indexRootOk;
  return {
    status: healthy ? 200 : 503,
    body: {
      status: healthy ? 'ok' : 'degraded',
      transport: 'http',
      checks,
      uptime: process.uptime(),
    },
  };
}

async function startHttp(): Promise<void> {
  const toolCount = getToolCount();

  // Cleanup expired sessions every 60 seconds
  setInterval(() => {
    const now = Date.now();
    const ttlMs = SESSION_TTL_S * 1000;
    for (const [id, entry] of sessions) {
      if (now - entry.lastActivity > ttlMs) {
        console.error(`[HTTP] Expiring session ${id}`);
        entry.transport.close().catch(logCloseError(`transport ${id}`));
        entry.server.close().catch(logCloseError(`server ${id}`));
        sessions.delete(id);
      }
    }
  }, 60_000).unref();

  const httpServer = http.createServer(async (req, res) => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'POST, GET, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Mcp-Session-Id');
    res.setHeader('Access-Control-Expose-Headers', 'Mcp-Session-Id');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    // Health check endpoint (not part of MCP protocol)
    if (req.method === 'GET' && req.url === '/health') {
      const { status, body } = healthPayload(toolCount);
      res.writeHead(status, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify(body));
      return;
    }

    // All MCP traffic goes to /mcp
    if (req.url !== '/mcp') {
      res.writeHead(404, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'Not found. MCP endpoint is /mcp' }));
      return;
    }

    try {
      const header = req.headers['mcp-session-id'];
      const sessionId = typeof header === 'string' ? header : undefined;
      const existing = sessionId !== undefined ? sessions.get(sessionId) : undefined;

      if (existing) {
        existing.lastActivity = Date.now();
        await existing.transport.handleRequest(req, res);
        return;
      }

      if (req.method === 'POST' && sessionId === undefined) {
        // Connect before handling: the initialize request registers the session
        const entry = createSessionEntry();
        await entry.server.connect(entry.transport);
        await entry.transport.handleRequest(req, res);
        return;
      }

      res.writeHead(400, { 'Content-Type': 'application/json' });
      res.end(
        JSON.stringify({
          jsonrpc: '2.0',
          error: {
            code: -32000,
            message: 'Bad Request: No valid session ID provided',
          },
          id: null,
        })
      );
    } catch (error) {
      console.error('[HTTP] Request error:', error instanceof Error ? error.message : String(error));
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ error: 'Internal server error' }));
      }
    }
  });

  httpServer.listen(PORT, '0.0.0.0', () => {
    console.error(`Document Chat MCP Server (HTTP) listening on 0.0.0.0:${PORT}`);
    console.error(`Tools registered: ${toolCount}`);
    console.error(`Session TTL: ${SESSION_TTL_S}s`);
    console.error(`Health: http://localhost:${PORT}/health`);
    console.error(`MCP endpoint: http://localhost:${PORT}/mcp`);
  });

  function handleShutdown(signal: string): void {
    console.error(`[Shutdown] Received ${signal}, shutting down gracefully...`);
    httpServer.close(() => {
      console.error('[Shutdown] HTTP server closed');
      const closePromises: Promise<void>[] = [];
      for (const [id, entry] of sessions) {
        closePromises.push(entry.transport.close().catch(logCloseError(`transport ${id}`)));
        closePromises.push(entry.server.close().catch(logCloseError(`server ${id}`)));
        sessions.delete(id);
      }
      void Promise.all(closePromises).then(() => {
        console.error('[Shutdown] All sessions closed');
        process.exit(0);
      });
    });
    setTimeout(() => {
      console.error('[Shutdown] Forced exit after timeout');
      process.exit(1);
    }, 10_000).unref();
  }

  process.on('SIGTERM', () => handleShutdown('SIGTERM'));
  process.on('SIGINT', () => handleShutdown('SIGINT'));
}

// =============================================================================
// MAIN
// =============================================================================

async function main(): Promise<void> {
  validateStartupDependencies();

  if (TRANSPORT === 'http') {
    console.error('[Transport] Starting in HTTP mode (MCP_TRANSPORT=http)');
    await startHttp();
  } else if (TRANSPORT === 'stdio') {
    await startStdio();
  } else {
    console.error(`[FATAL] Unknown MCP_TRANSPORT value: "${TRANSPORT}". Must be "stdio" or "http".`);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal error starting MCP server:', error);
  process.exit(1);
});
