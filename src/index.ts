#!/usr/bin/env node
/**
 * Ontology Extraction MCP Server
 *
 * Entry point for the MCP server using stdio transport. Builds the LLM
 * provider from the environment once, then registers every tool.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module index
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { createLLMProvider } from './services/gemini/provider.js';
import { setLLMProvider, state } from './server/index.js';
import { allTools } from './tools/index.js';

const SERVER_NAME = 'ontology-extract-mcp';
const SERVER_VERSION = '0.1.0';

function createServer(): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  for (const [name, tool] of Object.entries(allTools)) {
    server.tool(name, tool.description, tool.inputSchema, (params) => tool.handler(params));
  }
  return server;
}

async function main(): Promise<void> {
  const provider = createLLMProvider();
  setLLMProvider(provider);
  if (provider.status === 'ready') {
    console.error(
      `[Server] LLM ready (extraction: ${provider.config.extractionModel}, answer: ${provider.config.answerModel})`
    );
  } else {
    console.warn(`[Server] LLM unconfigured: ${provider.reason}. Extraction returns no proposals.`);
  }

  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(
    `[Server] ${SERVER_NAME} ${SERVER_VERSION} running on stdio with ${Object.keys(allTools).length} tools ` +
      `(storage: ${state.config.defaultStoragePath})`
  );
}

main().catch((error: unknown) => {
  console.error('[Server] Fatal error:', error);
  process.exit(1);
});
