#!/usr/bin/env node
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import dotenv from 'dotenv';
import { join } from 'node:path';
import { BoardStore } from './boardStore.js';
import { getWorkspacePath, loadConfig } from './config.js';
import { createLogger } from './log.js';
import { TOOLS, callTool } from './tools.js';

async function main() {
  dotenv.config({ path: join(getWorkspacePath(), '.env') });
  const config = loadConfig();
  const logger = createLogger('taskboard-mcp', config.logLevel);

  const board = BoardStore.open(config);
  logger.info('board opened', {
    backend: board.db.kind,
    ...(board.db.kind === 'json' ? { workspace: config.workspacePath, board: config.boardPath } : { poolMax: config.poolMax })
  });

  const server = new Server(
    {
      name: 'taskboard-mcp',
      version: '0.1.0'
    },
    {
      capabilities: {
        tools: {}
      }
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOLS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (req, extra) => {
    logger.debug(`call ${req.params.name}`);
    return callTool(board, req.params.name, req.params.arguments ?? {}, { signal: extra.signal, logger });
  });

  const shutdown = async (signal: string) => {
    logger.info(`received ${signal}, closing`);
    await server.close();
    await board.close();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        console.error(err);
        process.exit(1);
      });
    });
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((err) => {
  // stderr is ok for MCP stdio servers
  console.error(err);
  process.exit(1);
});
