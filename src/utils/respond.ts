// Envelope helpers shared by every capability handler.
// Every segment is tagged 'text'; nothing here emits any other content type.
import type { PromptResult, ResourceResult, TextSegment, ToolResult } from '../types.js';

export const segment = (text: string): TextSegment => ({ type: 'text', text });

export const text = (...parts: string[]): ToolResult => ({ content: parts.map(segment) });

export const json = (data: unknown): string => JSON.stringify(data, null, 2);

export function resourceText(uri: string, body: string, mimeType?: string): ResourceResult {
  return { contents: [mimeType ? { uri, mimeType, text: body } : { uri, text: body }] };
}

export function userPrompt(description: string, body: string): PromptResult {
  return { description, messages: [{ role: 'user', content: segment(body) }] };
}
