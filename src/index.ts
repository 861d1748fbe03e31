#!/usr/bin/env node
/**
 * IDNT - IT Device Naming Tool - Entry Point
 *
 * - No command: interactive form
 * - compose / tables / init: one-shot CLI commands
 * - serve: MCP server on stdio
 */

import { parseArgs, validateArgs, generateHelpText } from './server/arg-parser.js';
import type { AppContext } from './server/setup.js';

const parsedArgs = parseArgs(process.argv.slice(2));

try {
  validateArgs(parsedArgs);
} catch (error) {
  console.error('Error:', error instanceof Error ? error.message : String(error));
  console.error('Run "idnt --help" for usage.');
  process.exit(1);
}

if (parsedArgs.help) {
  console.log(generateHelpText());
  process.exit(0);
}

main().then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
);

async function main(): Promise<number> {
  const { initializeApp } = await import('./server/setup.js');
  const { registerShutdownHandlers, performCleanup } = await import('./server/shutdown.js');
  const { handleInitializationError } = await import('./utils/error-handler.js');

  registerShutdownHandlers();

  let context: AppContext;
  try {
    context = initializeApp(parsedArgs);
  } catch (error) {
    const message = handleInitializationError(error);
    console.error(`❌ Failed to start: ${message}`);
    performCleanup();
    return 1;
  }

  switch (parsedArgs.command) {
    case 'serve':
      // Keeps running until the client disconnects or a signal arrives
      await startMcpServer(context);
      return 0;
    case 'form': {
      const { runTerminalForm } = await import('./form/terminal-form.js');
      await runTerminalForm(context);
      performCleanup();
      return 0;
    }
    default: {
      const { runCli } = await import('./cli.js');
      const code = await runCli(parsedArgs, context);
      performCleanup();
      return code;
    }
  }
}

// ============================================================================
// MCP Server
// ============================================================================
async function startMcpServer(context: AppContext): Promise<void> {
  const { Server } = await import('@modelcontextprotocol/sdk/server/index.js');
  const { StdioServerTransport } = await import('@modelcontextprotocol/sdk/server/stdio.js');
  const {
    CallToolRequestSchema,
    ListToolsRequestSchema,
  } = await import('@modelcontextprotocol/sdk/types.js');
  const { getToolRegistry } = await import('./server/tool-registry.js');
  const { handleToolCall } = await import('./server/tool-handlers.js');
  const { safeConsoleError } = await import('./utils/error-handler.js');
  const { APP_VERSION } = await import('./constants.js');

  const server = new Server(
    {
      name: 'idnt',
      version: APP_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: getToolRegistry(),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    return await handleToolCall(request, context);
  });

  // Connect transport FIRST: stdout belongs to JSON-RPC from here on
  const transport = new StdioServerTransport();
  await server.connect(transport);

  safeConsoleError('✓ IDNT MCP server running on stdio');
  safeConsoleError(`  Data directory: ${context.dataDir}`);
  safeConsoleError(`  Tables: ${Object.values(context.tables).map(table => `${table.category}=${table.source}`).join(', ')}`);
}
