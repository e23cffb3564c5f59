import type { ZodRawShape, ZodType, ZodOptional } from 'zod';

export interface Task {
  id: number;
  title: string;
  description?: string; // seed tasks carry none
  completed: boolean;
  created: string; // YYYY-MM-DD
}

export interface NoteEntry {
  name: string; // file name, e.g. mcp_basics.md
  stem: string;
  path: string; // notesDir joined with name, as listed
  uri: string; // file://<path>
  title?: string; // from front matter
  description?: string; // from front matter
}

// Outcomes for recognised-but-unsatisfiable requests; rendered as text, never thrown
export type CompleteOutcome = { ok: true; task: Task } | { ok: false; id: unknown };
export type NoteReadOutcome = { ok: true; text: string } | { ok: false; path: string };

// Result envelopes handed back to the transport. Kept as type aliases so they stay
// assignable to the SDK's passthrough result types.
export type TextSegment = { type: 'text'; text: string };
export type ToolResult = { content: TextSegment[] };
export type ResourceContent = { uri: string; mimeType?: string; text: string };
export type ResourceResult = { contents: ResourceContent[] };
export type PromptMessage = { role: 'user' | 'assistant'; content: TextSegment };
export type PromptResult = { description?: string; messages: PromptMessage[] };

export type CapabilityKind = 'tool' | 'resource' | 'prompt';
export type CapabilityArgs = Record<string, unknown>;

export type ResourceDescriptor = {
  uri: string;
  name: string;
  title?: string;
  description?: string;
  mimeType?: string;
};

// MCP prompt arguments are strings on the wire
export type PromptArgsShape = Record<string, ZodType<string> | ZodOptional<ZodType<string>>>;

export interface ToolDescriptor {
  name: string;
  title: string;
  description: string;
  args: ZodRawShape;
}

export interface PromptDescriptor {
  name: string;
  title: string;
  description: string;
  args: PromptArgsShape;
}
