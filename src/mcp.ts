#!/usr/bin/env node
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema
} from '@modelcontextprotocol/sdk/types.js';
import { callTool, CONTRACT, status, TOOLS } from './api/tools.js';
import { loadConfig, loadPolicy, resolvePaths } from './core/config.js';
import { Engine } from './core/engine.js';
import { createStderrLogger } from './core/logger.js';

const cfg = loadConfig(process.env);
// stdout carries the protocol
const log = createStderrLogger(cfg.PHASEGATE_LOG_LEVEL === 'info' ? 'warn' : cfg.PHASEGATE_LOG_LEVEL);
const paths = resolvePaths(cfg);
const engine = new Engine({ paths, policy: loadPolicy(paths.stateDir), log, signingKey: cfg.PHASEGATE_SIGNING_KEY });

const server = new Server(
  {
    name: 'phasegate',
    version: '0.1.0'
  },
  {
    capabilities: {
      tools: {},
      resources: {}
    }
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools: TOOLS };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  return callTool(engine, name, args ?? {});
});

server.setRequestHandler(ListResourcesRequestSchema, async () => {
  return {
    resources: [
      {
        uri: 'phasegate://contract',
        name: 'Phase gate contract',
        description: 'Rules every agent works under: evidence, phases, delegation depth',
        mimeType: 'text/markdown'
      },
      {
        uri: 'phasegate://status',
        name: 'Phase gate status',
        description: 'Enforcement mode and active tasks',
        mimeType: 'application/json'
      }
    ]
  };
});

server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
  const { uri } = request.params;

  if (uri === 'phasegate://contract') {
    return { contents: [{ uri, mimeType: 'text/markdown', text: CONTRACT }] };
  }

  if (uri === 'phasegate://status') {
    return {
      contents: [
        {
          uri,
          mimeType: 'application/json',
          text: JSON.stringify(await status(engine), null, 2)
        }
      ]
    };
  }

  throw new Error(`Unknown resource: ${uri}`);
});

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  process.on('SIGINT', () => {
    engine.close();
    process.exit(0);
  });
}

main().catch((err) => {
  log.fatal({ err }, 'phasegate MCP server error');
  process.exit(1);
});
