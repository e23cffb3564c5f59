import type {
  CapabilityArgs,
  CapabilityKind,
  PromptDescriptor,
  PromptResult,
  ResourceDescriptor,
  ResourceResult,
  ToolDescriptor,
  ToolResult,
} from '../types.js';
import type { CapabilityRegistry, HandlerContext } from './registry.js';

// Hard failure: nothing is registered under this name/URI
export class UnknownCapabilityError extends Error {
  constructor(readonly kind: CapabilityKind, readonly capability: string) {
    super(`Unknown ${kind === 'resource' ? 'resource URI' : kind}: ${capability}`);
    this.name = 'UnknownCapabilityError';
  }
}

export interface DispatcherOptions {
  debug?: boolean; // log every invocation on stderr
}

/**
 * Resolves (kind, name, args) through the registry and runs the handler against
 * the shared stores. Requests are independent: an unknown name fails only that call.
 */
export class Dispatcher {
  private readonly debug: boolean;

  constructor(
    readonly registry: CapabilityRegistry,
    readonly ctx: HandlerContext,
    opts: DispatcherOptions = {},
  ) {
    this.debug = opts.debug ?? false;
  }

  listTools(): ToolDescriptor[] {
    return this.registry.listTools();
  }

  listPrompts(): PromptDescriptor[] {
    return this.registry.listPrompts();
  }

  listResources(): Promise<ResourceDescriptor[]> {
    return this.registry.listResources(this.ctx);
  }

  invoke(kind: 'tool', name: string, args?: CapabilityArgs): Promise<ToolResult>;
  invoke(kind: 'resource', uri: string, args?: CapabilityArgs): Promise<ResourceResult>;
  invoke(kind: 'prompt', name: string, args?: CapabilityArgs): Promise<PromptResult>;
  async invoke(kind: CapabilityKind, name: string, args: CapabilityArgs = {}): Promise<ToolResult | ResourceResult | PromptResult> {
    if (this.debug) console.error('[dispatch]', { kind, name });
    switch (kind) {
      case 'tool':
        return this.callTool(name, args);
      case 'resource':
        return this.readResource(name);
      case 'prompt':
        return this.getPrompt(name, args);
    }
  }

  async callTool(name: string, args: CapabilityArgs = {}): Promise<ToolResult> {
    const tool = this.registry.tool(name);
    if (!tool) throw new UnknownCapabilityError('tool', name);
    return tool.handler(args, this.ctx);
  }

  async readResource(uri: string): Promise<ResourceResult> {
    const match = this.registry.resolveResource(uri);
    if (!match) throw new UnknownCapabilityError('resource', uri);
    if (match.kind === 'exact') return match.resource.handler(uri, this.ctx);
    return match.route.handler(uri, match.rest, this.ctx);
  }

  async getPrompt(name: string, args: CapabilityArgs = {}): Promise<PromptResult> {
    const prompt = this.registry.prompt(name);
    if (!prompt) throw new UnknownCapabilityError('prompt', name);
    return prompt.handler(args, this.ctx);
  }
}
