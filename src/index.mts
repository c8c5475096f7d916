#!/usr/bin/env node
import { createServer, type IncomingMessage } from 'node:http';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolRequest,
} from '@modelcontextprotocol/sdk/types.js';
import { getConfig, assertRequiredConfig, type AppConfig } from './config.js';
import { logger } from './logger.js';
import { createMonitor, type Monitor } from './services/monitor.js';
import { TOOL_DEFINITIONS, callTool } from './tools.js';

const config = getConfig();
assertRequiredConfig(config);

const monitor = createMonitor(config);

const server = new Server(
  {
    name: 'unrest-monitor',
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
  tools: TOOL_DEFINITIONS,
}));

server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest) =>
  callTool(monitor, request.params.name, request.params.arguments),
);

async function shutdown(signal: NodeJS.Signals) {
  logger.info({ signal }, 'Shutting down');
  monitor.scheduler.stop();
  await server.close();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err, signal }, 'Shutdown failed');
      process.exit(1);
    });
  });
}

/**
 * Request gate for the HTTP transport: host and origin allow-lists apply only
 * when configured. Returns the rejection reason, or null to let the request through.
 */
function rejectReason(req: IncomingMessage, cfg: AppConfig): string | null {
  if (cfg.allowedHosts.length && req.headers.host) {
    const [host = ''] = req.headers.host.split(':');
    if (!cfg.allowedHosts.includes(host)) return 'Forbidden host';
  }
  if (cfg.allowedOrigins.length && req.headers.origin && !cfg.allowedOrigins.includes(req.headers.origin)) {
    return 'Forbidden origin';
  }
  return null;
}

async function startHttp(cfg: AppConfig, mon: Monitor) {
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: undefined,
  });
  await server.connect(transport);

  const httpServer = createServer((req, res) => {
    if (req.method === 'GET' && req.url === '/healthz') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ status: 'ok', countries: mon.scheduler.countries.length, running: mon.scheduler.running }));
      return;
    }

    const reason = rejectReason(req, cfg);
    if (reason) {
      res.statusCode = 403;
      res.end(reason);
      return;
    }

    transport.handleRequest(req, res).catch((err: unknown) => {
      logger.error({ err }, 'HTTP transport error');
      if (!res.headersSent) {
        res.statusCode = 500;
      }
      res.end('Internal Server Error');
    });
  });

  httpServer.listen(cfg.port, cfg.httpHost, () => {
    logger.info({ transport: 'http', host: cfg.httpHost, port: cfg.port }, 'Unrest monitor listening');
  });
}

async function start() {
  if (config.transport === 'http') {
    await startHttp(config, monitor);
  } else {
    await server.connect(new StdioServerTransport());
    logger.info({ transport: 'stdio' }, 'Unrest monitor listening');
  }

  if (config.scheduler.enabled) {
    monitor.scheduler.start();
  }
}

start().catch((error: unknown) => {
  logger.error({ err: error }, 'Failed to start unrest monitor');
  process.exit(1);
});
