import { McpServer, ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { UnknownCapabilityError } from './capabilities/dispatcher.js';
import type { PlaygroundContext } from './context.js';

// Core hard failures become protocol errors; anything else propagates unchanged
async function dispatch<T>(run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (e) {
    if (e instanceof UnknownCapabilityError) throw new McpError(ErrorCode.InvalidParams, e.message);
    throw e;
  }
}

/**
 * Wires every registered capability into an McpServer. The SDK validates tool and
 * prompt arguments against each zod shape before the dispatcher runs.
 */
export function createServer(ctx: PlaygroundContext, version: string): McpServer {
  const { registry, dispatcher } = ctx;
  const server = new McpServer({ name: ctx.config.serverName, version });

  for (const tool of registry.toolCapabilities()) {
    server.registerTool(
      tool.name,
      { title: tool.title, description: tool.description, inputSchema: tool.args },
      async (args) => dispatch(() => dispatcher.invoke('tool', tool.name, args)),
    );
  }

  for (const res of registry.resourceCapabilities()) {
    const metadata = { title: res.title, description: res.description, mimeType: res.mimeType };
    if (res.kind === 'resource') {
      server.registerResource(res.name, res.uri, metadata, async (uri) =>
        dispatch(() => dispatcher.invoke('resource', uri.href)),
      );
      continue;
    }
    // `list` runs on every resources/list, so newly written notes appear without a restart
    const template = new ResourceTemplate(`${res.prefix}{+path}`, {
      list: async () => ({ resources: await res.list(ctx) }),
    });
    server.registerResource(res.name, template, metadata, async (uri) =>
      dispatch(() => dispatcher.invoke('resource', uri.href)),
    );
  }

  for (const prompt of registry.promptCapabilities()) {
    server.registerPrompt(
      prompt.name,
      { title: prompt.title, description: prompt.description, argsSchema: prompt.args },
      async (args) => dispatch(() => dispatcher.invoke('prompt', prompt.name, args)),
    );
  }

  return server;
}
