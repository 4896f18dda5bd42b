#!/usr/bin/env node
/**
 * Study Helper MCP Server - Unified Entry Point
 *
 * Transport selection via MCP_TRANSPORT environment variable:
 *   - (unset or "stdio") -> stdio transport (default)
 *   - "http"             -> Streamable HTTP transport (multi-user deployments)
 *
 * Environment variables:
 *   MCP_TRANSPORT              - Transport mode: "stdio" (default) or "http"
 *   MCP_HTTP_PORT              - Port for HTTP mode (default: 3100)
 *   MCP_SESSION_TTL            - Session TTL in seconds for HTTP mode (default: 3600)
 *   OPENAI_API_KEY             - Primary provider
 *   GEMINI_API_KEY             - Fallback provider and image text extraction
 *   USE_GEMINI_ALWAYS          - Skip the primary provider
 *
 * CRITICAL: In stdio mode, NEVER use console.log() - stdout is reserved for JSON-RPC.
 * Use console.error() for all logging in both modes.
 *
 * @module bin-http
 */

import http from 'http';
import { randomUUID } from 'crypto';

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { loadEnvironment } from './server/env.js';
import { registerAllTools, getToolCount } from './server/register-tools.js';
import { validateStartupDependencies } from './server/startup.js';
import { getLlmConfig } from './server/state.js';
import { sessionManager } from './server/transports/session-manager.js';
import { routesToSecondaryOnly } from './services/llm/config.js';

loadEnvironment();

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
    name: 'study-helper-mcp',
    version: '1.0.0',
  });
}

function logCloseError(what: string) {
  return (error: unknown) => {
    console.error(`[HTTP] ${what} close failed:`, error instanceof Error ? error.message : String(error));
  };
}

// =============================================================================
// STDIO MODE
// =============================================================================

async function startStdio(): Promise<void> {
  // The stdio entry validates, connects and installs its own shutdown handlers
  await import('./index.js');
}

// =============================================================================
// HTTP MODE
//
// One StreamableHTTPServerTransport + one McpServer per session. The
// Mcp-Session-Id also keys the study state in the session manager, so
// documents, chat history and board posts never leak across clients.
// =============================================================================

/** Tracked session: transport + server + activity timestamp for TTL */
interface SessionEntry {
  transport: StreamableHTTPServerTransport;
  server: McpServer;
  lastActivity: number;
}

const sessions = new Map<string, SessionEntry>();

function dropSession(sessionId: string): void {
  sessions.delete(sessionId);
  sessionManager.removeSession(sessionId);
}

/**
 * Create a new session. The transport's onsessioninitialized callback
 * registers it once the SDK has assigned the session id.
 */
function createSessionEntry(): SessionEntry {
  const server = createServer();
  registerAllTools(server);

  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: () => randomUUID(),
    onsessioninitialized: (sessionId: string) => {
      console.error(`[HTTP] Session initialized: ${sessionId}`);
      sessions.set(sessionId, entry);
    },
  });

  const entry: SessionEntry = { transport, server, lastActivity: Date.now() };

  transport.onclose = () => {
    const sid = transport.sessionId;
    if (sid && sessions.has(sid)) {
      console.error(`[HTTP] Transport closed for session ${sid}`);
      dropSession(sid);
    }
  };

  return entry;
}

async function startHttp(): Promise<void> {
  const toolCount = getToolCount();
  const ttlMs = SESSION_TTL_S * 1000;

  setInterval(() => {
    const now = Date.now();
    for (const [id, entry] of sessions) {
      if (now - entry.lastActivity > ttlMs) {
        console.error(`[HTTP] Expiring session ${id}`);
        entry.transport.close().catch(logCloseError('transport'));
        entry.server.close().catch(logCloseError('server'));
        dropSession(id);
      }
    }
    sessionManager.cleanupExpired(ttlMs);
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
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(
        JSON.stringify({
          status: 'ok',
          transport: 'http',
          checks: {
            tools_count: toolCount,
            transport_sessions: sessions.size,
            study_sessions: sessionManager.getSessionCount(),
            secondary_only: routesToSecondaryOnly(getLlmConfig()),
          },
          uptime: process.uptime(),
        })
      );
      return;
    }

    if (req.url !== '/mcp') {
      res.writeHead(404, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'Not found. MCP endpoint is /mcp' }));
      return;
    }

    try {
      const header = req.headers['mcp-session-id'];
      const sessionId = typeof header === 'string' ? header : undefined;
      const existing = sessionId ? sessions.get(sessionId) : undefined;

      if (existing) {
        existing.lastActivity = Date.now();
        await existing.transport.handleRequest(req, res);
        return;
      }

      if (req.method === 'POST' && !sessionId) {
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
    console.error(`Study Helper MCP Server (HTTP) listening on 0.0.0.0:${PORT}`);
    console.error(`Tools registered: ${toolCount}`);
    console.error(`Session TTL: ${SESSION_TTL_S}s`);
    console.error(`MCP endpoint: http://localhost:${PORT}/mcp`);
  });

  function handleShutdown(signal: string): void {
    console.error(`[Shutdown] Received ${signal}, shutting down gracefully...`);
    httpServer.close(() => {
      console.error('[Shutdown] HTTP server closed');
      const closing: Promise<void>[] = [];
      for (const [id, entry] of sessions) {
        closing.push(entry.transport.close().catch(logCloseError('transport')));
        closing.push(entry.server.close().catch(logCloseError('server')));
        dropSession(id);
      }
      void Promise.all(closing).then(() => {
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
  if (TRANSPORT === 'http') {
    validateStartupDependencies();
    console.error('[Transport] Starting in HTTP mode (MCP_TRANSPORT=http)');
    await startHttp();
  } else if (TRANSPORT === 'stdio') {
    await startStdio();
  } else {
    console.error(`[FATAL] Unknown MCP_TRANSPORT value: "${TRANSPORT}". Must be "stdio" or "http".`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error starting MCP server:', error);
  process.exit(1);
});
