import type { NoteStore } from '../storage/notes.js';
import type { TaskStore } from '../storage/tasks.js';
import type {
  CapabilityArgs,
  PromptDescriptor,
  PromptResult,
  ResourceDescriptor,
  ResourceResult,
  ToolDescriptor,
  ToolResult,
} from '../types.js';

// What every handler receives: the stores, by reference
export interface HandlerContext {
  tasks: TaskStore;
  notes: NoteStore;
  serverName: string;
}

type MaybePromise<T> = T | Promise<T>;

export interface ToolCapability extends ToolDescriptor {
  kind: 'tool';
  handler: (args: CapabilityArgs, ctx: HandlerContext) => MaybePromise<ToolResult>;
}

export interface PromptCapability extends PromptDescriptor {
  kind: 'prompt';
  handler: (args: CapabilityArgs, ctx: HandlerContext) => MaybePromise<PromptResult>;
}

// One literal URI
export interface FixedResource extends ResourceDescriptor {
  kind: 'resource';
  handler: (uri: string, ctx: HandlerContext) => MaybePromise<ResourceResult>;
}

// Every URI starting with `prefix`; the handler gets the remainder. `list` enumerates
// the currently known members and is called afresh for every listing.
export interface ResourcePrefixRoute {
  kind: 'resource-prefix';
  prefix: string;
  name: string;
  title?: string;
  description?: string;
  mimeType?: string;
  list: (ctx: HandlerContext) => Promise<ResourceDescriptor[]>;
  handler: (uri: string, rest: string, ctx: HandlerContext) => MaybePromise<ResourceResult>;
}

export type ResourceCapability = FixedResource | ResourcePrefixRoute;

export type ResourceMatch =
  | { kind: 'exact'; resource: FixedResource }
  | { kind: 'prefix'; route: ResourcePrefixRoute; rest: string };

function duplicate(kind: string, name: string): Error {
  return new Error(`[registry] duplicate ${kind} registration detected: "${name}"`);
}

/**
 * Name -> handler maps for the three capability kinds. Filled once at startup;
 * enumeration follows registration order.
 */
export class CapabilityRegistry {
  private readonly tools = new Map<string, ToolCapability>();
  private readonly prompts = new Map<string, PromptCapability>();
  private readonly fixed = new Map<string, FixedResource>();
  private readonly prefixes = new Map<string, ResourcePrefixRoute>();
  private readonly resourceOrder: ResourceCapability[] = [];

  registerTool(tool: ToolCapability): this {
    if (this.tools.has(tool.name)) throw duplicate('tool', tool.name);
    this.tools.set(tool.name, tool);
    return this;
  }

  registerPrompt(prompt: PromptCapability): this {
    if (this.prompts.has(prompt.name)) throw duplicate('prompt', prompt.name);
    this.prompts.set(prompt.name, prompt);
    return this;
  }

  registerResource(resource: ResourceCapability): this {
    if (resource.kind === 'resource') {
      if (this.fixed.has(resource.uri)) throw duplicate('resource', resource.uri);
      this.fixed.set(resource.uri, resource);
    } else {
      if (this.prefixes.has(resource.prefix)) throw duplicate('resource prefix', resource.prefix);
      this.prefixes.set(resource.prefix, resource);
    }
    this.resourceOrder.push(resource);
    return this;
  }

  tool(name: string): ToolCapability | undefined {
    return this.tools.get(name);
  }

  prompt(name: string): PromptCapability | undefined {
    return this.prompts.get(name);
  }

  // Exact URIs win over prefixes; among prefixes the first registered match wins
  resolveResource(uri: string): ResourceMatch | undefined {
    const resource = this.fixed.get(uri);
    if (resource) return { kind: 'exact', resource };
    for (const route of this.prefixes.values()) {
      if (uri.startsWith(route.prefix)) return { kind: 'prefix', route, rest: uri.slice(route.prefix.length) };
    }
    return undefined;
  }

  toolCapabilities(): ToolCapability[] {
    return [...this.tools.values()];
  }

  promptCapabilities(): PromptCapability[] {
    return [...this.prompts.values()];
  }

  resourceCapabilities(): ResourceCapability[] {
    return [...this.resourceOrder];
  }

  listTools(): ToolDescriptor[] {
    return this.toolCapabilities().map(({ name, title, description, args }) => ({ name, title, description, args }));
  }

  listPrompts(): PromptDescriptor[] {
    return this.promptCapabilities().map(({ name, title, description, args }) => ({ name, title, description, args }));
  }

  async listResources(ctx: HandlerContext): Promise<ResourceDescriptor[]> {
    const out: ResourceDescriptor[] = [];
    for (const r of this.resourceOrder) {
      if (r.kind === 'resource') {
        const { uri, name, title, description, mimeType } = r;
        out.push({ uri, name, title, description, mimeType });
      } else {
        out.push(...(await r.list(ctx)));
      }
    }
    return out;
  }
}
