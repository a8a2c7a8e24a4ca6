#!/usr/bin/env node
import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ErrorCode,
  type CallToolRequest,
} from '@modelcontextprotocol/sdk/types.js';
import { getConfig, getPollConfig } from './config.js';
import { logger } from './logger.js';
import { DEFAULT_SOURCES } from './constants/sources.js';
import { StateStore } from './services/stateStore.js';
import { SourceHttpClient } from './services/httpClient.js';
import { createSourceFetcher } from './services/fetchers.js';
import { PollOrchestrator } from './services/orchestrator.js';
import { buildCodesPayload, renderDashboard } from './services/dashboard.js';
import {
  ToolError,
  formatLookup,
  formatSnapshotSummary,
  lookupCode,
  parseArgs,
  querySnapshot,
} from './services/tools.js';
import { GetSnapshotArgsSchema, LookupCodeArgsSchema } from './schemas/tools.js';
import { codesPayloadJsonSchema } from './schemas/snapshot.js';

const config = getConfig();

const store = new StateStore({
  maxCandidates: config.capacity.maxCandidates,
  maxLogEntries: config.capacity.maxLogEntries,
  logger,
});

const poller = new PollOrchestrator({
  store,
  sources: DEFAULT_SOURCES,
  fetchSource: createSourceFetcher(
    new SourceHttpClient({ timeoutMs: config.poll.requestTimeoutMs, logger }),
    logger,
  ),
  loadConfig: () => getPollConfig(),
  logger,
});

/**
 * MCP read-side over the shared store. One instance serves stdio; the HTTP transport
 * builds a fresh one per request (stateless mode).
 */
function createMcpServer(): Server {
  const server = new Server(
    {
      name: 'invite-hunter',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.onerror = (error: Error) => logger.error({ err: error }, 'Unhandled MCP error');

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: 'get_snapshot',
        description: 'Current invite-code candidates (most recent first), counters and source health.',
        inputSchema: {
          type: 'object',
          properties: {
            limit: { type: 'integer', minimum: 1, maximum: 1000, description: 'Maximum candidates to return (default 50).' },
            minConfidence: { type: 'number', minimum: 0, maximum: 1, description: 'Only candidates at or above this confidence.' },
          },
        },
      },
      {
        name: 'lookup_code',
        description: 'Check whether a code has been seen and return its candidate if still retained.',
        inputSchema: {
          type: 'object',
          properties: {
            code: { type: 'string', description: 'Code to look up (case-insensitive).' },
          },
          required: ['code'],
        },
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest) => {
    try {
      switch (request.params.name) {
        case 'get_snapshot': {
          const view = querySnapshot(store, parseArgs(GetSnapshotArgsSchema, request.params.arguments));
          return {
            content: [{ type: 'text', text: formatSnapshotSummary(view) }],
            structuredContent: { ...view },
          };
        }
        case 'lookup_code': {
          const result = lookupCode(store, parseArgs(LookupCodeArgsSchema, request.params.arguments));
          return {
            content: [{ type: 'text', text: formatLookup(result) }],
            structuredContent: { ...result },
          };
        }
        default:
          throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${request.params.name}`);
      }
    } catch (error: unknown) {
      if (error instanceof McpError) {
        throw error;
      }
      if (error instanceof ToolError) {
        throw new McpError(error.code, error.message, error.details);
      }
      logger.error({ err: error }, 'Unexpected tool invocation failure');
      throw new McpError(ErrorCode.InternalError, error instanceof Error ? error.message : 'Unexpected error');
    }
  });

  return server;
}

async function handleMcpRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
  const server = createMcpServer();
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: undefined,
  });
  res.on('close', () => {
    transport.close().catch((err: unknown) => logger.warn({ err }, 'MCP transport close failed'));
    server.close().catch((err: unknown) => logger.warn({ err }, 'MCP server close failed'));
  });
  await server.connect(transport);
  await transport.handleRequest(req, res);
}

function sendJson(res: ServerResponse, body: unknown) {
  res.statusCode = 200;
  res.setHeader('Content-Type', 'application/json; charset=utf-8');
  res.setHeader('Cache-Control', 'no-store');
  res.end(JSON.stringify(body));
}

async function start() {
  store.appendLog('info', 'System initialized');

  if (config.transport === 'http') {
    const allowedHosts = new Set(config.allowedHosts);
    const allowedOrigins = new Set(config.allowedOrigins);

    const httpServer = createServer((req, res) => {
      const path = (req.url ?? '/').split('?')[0];

      if (req.method === 'GET' && path === '/healthz') {
        res.statusCode = 200;
        res.end('ok');
        return;
      }

      if (!isHostAllowed(req.headers.host, allowedHosts)) {
        res.statusCode = 403;
        res.end('Forbidden host');
        return;
      }
      if (!isOriginAllowed(req.headers.origin, allowedOrigins)) {
        res.statusCode = 403;
        res.end('Forbidden origin');
        return;
      }

      if (req.method === 'GET' && path === '/codes.json') {
        sendJson(res, buildCodesPayload(store.snapshot(), getPollConfig(), poller.state));
        return;
      }
      if (req.method === 'GET' && path === '/codes.schema.json') {
        sendJson(res, codesPayloadJsonSchema);
        return;
      }
      if (req.method === 'GET' && path === '/') {
        res.statusCode = 200;
        res.setHeader('Content-Type', 'text/html; charset=utf-8');
        res.end(renderDashboard(buildCodesPayload(store.snapshot(), getPollConfig(), poller.state)));
        return;
      }
      if (path !== '/mcp') {
        res.statusCode = 404;
        res.end('Not found');
        return;
      }

      handleMcpRequest(req, res).catch((err: unknown) => {
        logger.error({ err }, 'HTTP transport error');
        if (!res.headersSent) {
          res.statusCode = 500;
        }
        res.end('Internal Server Error');
      });
    });

    httpServer.listen(config.port, config.httpHost, () => {
      logger.info({ transport: 'http', host: config.httpHost, port: config.port }, 'Invite Hunter listening');
    });
  } else {
    const server = createMcpServer();
    process.on('SIGINT', async () => {
      logger.info('SIGINT received, closing server');
      await server.close();
      process.exit(0);
    });
    await server.connect(new StdioServerTransport());
    logger.info({ transport: 'stdio' }, 'Invite Hunter listening');
  }

  logger.info({ sources: DEFAULT_SOURCES.length }, 'Background polling started');
  poller.run().catch((error: unknown) => {
    logger.fatal({ err: error }, 'Poller stopped unexpectedly');
    process.exit(1);
  });
}

function isHostAllowed(hostHeader: string | undefined, whitelist: Set<string>): boolean {
  if (!whitelist.size || !hostHeader) return true;
  const host = hostHeader.split(':')[0];
  return whitelist.has(host);
}

function isOriginAllowed(originHeader: string | undefined, whitelist: Set<string>): boolean {
  if (!whitelist.size || !originHeader) return true;
  return whitelist.has(originHeader);
}

start().catch((error: unknown) => {
  logger.error({ err: error }, 'Failed to start Invite Hunter');
  process.exit(1);
});
