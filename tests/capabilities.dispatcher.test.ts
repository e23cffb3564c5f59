import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import fs from 'node:fs/promises';
import os from 'node:os';
import type { PlaygroundConfig } from '../src/config.js';
import { createContext } from '../src/context.js';
import type { PlaygroundContext } from '../src/context.js';
import { UnknownCapabilityError } from '../src/capabilities/dispatcher.js';

let TMP: string;
let notesDir: string;
let ctx: PlaygroundContext;

function testConfig(dir: string): PlaygroundConfig {
  return { notesDir: dir, seedNotes: true, seedTasks: true, serverName: 'test-server', logLevel: 'warn', logStartup: false };
}

beforeEach(async () => {
  TMP = await fs.mkdtemp(path.join(os.tmpdir(), 'mcp-dispatch-'));
  notesDir = path.join(TMP, 'notes');
  ctx = await createContext(testConfig(notesDir), { clock: () => new Date(2026, 2, 1) });
});

afterEach(async () => {
  await fs.rm(TMP, { recursive: true, force: true });
});

const PENDING_SEED = [
  { id: 1, title: 'Learn MCP basics', completed: false, created: '2025-08-15' },
  { id: 3, title: 'Understand resources', completed: false, created: '2025-08-15' },
];

describe('dispatcher: listings', () => {
  it('enumerates every capability in definition order', async () => {
    expect(ctx.dispatcher.listTools().map((t) => t.name)).toEqual(['add_task', 'list_tasks', 'complete_task', 'get_weather', 'calculate']);
    expect(ctx.dispatcher.listPrompts().map((p) => p.name)).toEqual(['task_summary', 'learning_plan', 'explain_concept']);
    expect((await ctx.dispatcher.listResources()).map((r) => r.uri)).toEqual([
      'tasks://database',
      `file://${path.join(notesDir, 'learning_goals.md')}`,
      `file://${path.join(notesDir, 'mcp_basics.md')}`,
      'system://info',
    ]);
  });
});

describe('dispatcher: tools', () => {
  it('wraps handler output in a text envelope', async () => {
    const res = await ctx.dispatcher.invoke('tool', 'add_task', { title: 'Write docs', description: 'README' });
    expect(res).toEqual({ content: [{ type: 'text', text: "Task 'Write docs' added with ID 4" }] });
    expect(ctx.tasks.list()[3]).toEqual({ id: 4, title: 'Write docs', description: 'README', completed: false, created: '2026-03-01' });
  });

  it('runs calculate and get_weather', async () => {
    expect(await ctx.dispatcher.invoke('tool', 'calculate', { expression: '2 + 2' })).toEqual({
      content: [{ type: 'text', text: '2 + 2 = 4' }],
    });
    expect(await ctx.dispatcher.invoke('tool', 'calculate', { expression: 'import os' })).toEqual({
      content: [{ type: 'text', text: 'Invalid expression. Only basic math operations allowed.' }],
    });
    const london = await ctx.dispatcher.invoke('tool', 'get_weather', { city: 'London' });
    expect(london.content[0].text).toBe('Weather in London:\n🌡️ Temperature: 62°F\n🌤️ Condition: Rainy\n💧 Humidity: 90%');
    const elsewhere = await ctx.dispatcher.invoke('tool', 'get_weather', { city: 'london' });
    expect(elsewhere.content[0].text).toBe('Weather in london:\n🌡️ Temperature: 72°F\n🌤️ Condition: Unknown\n💧 Humidity: 70%');
  });

  it('reports an unknown task id as text without touching the store', async () => {
    const before = ctx.tasks.snapshot();
    const res = await ctx.dispatcher.invoke('tool', 'complete_task', { task_id: 99 });
    expect(res.content).toEqual([{ type: 'text', text: 'Task with ID 99 not found.' }]);
    expect(ctx.tasks.snapshot()).toEqual(before);
  });

  it('marks tasks completed and shows it in list_tasks', async () => {
    await ctx.dispatcher.invoke('tool', 'complete_task', { task_id: 3 });
    const res = await ctx.dispatcher.invoke('tool', 'list_tasks', {});
    expect(res.content[0].text.split('\n')[3]).toBe('✅ [3] Understand resources (created: 2025-08-15)');
  });

  it('does not check required arguments itself', async () => {
    // the transport's schema check is the only validation layer
    const added = await ctx.dispatcher.invoke('tool', 'add_task', {});
    expect(added.content[0].text).toBe("Task 'undefined' added with ID 4");
    const completed = await ctx.dispatcher.invoke('tool', 'complete_task');
    expect(completed.content[0].text).toBe('Task with ID undefined not found.');
  });

  it('fails hard on an unknown tool and keeps serving afterwards', async () => {
    await expect(ctx.dispatcher.invoke('tool', 'delete_task', { task_id: 1 })).rejects.toThrow(UnknownCapabilityError);
    await expect(ctx.dispatcher.invoke('tool', 'delete_task')).rejects.toThrow('Unknown tool: delete_task');
    const res = await ctx.dispatcher.invoke('tool', 'list_tasks');
    expect(res.content[0].text.startsWith('Current Tasks:\n')).toBe(true);
    expect(ctx.tasks.size).toBe(3);
  });
});

describe('dispatcher: resources', () => {
  it('serves the task database as pretty JSON', async () => {
    const res = await ctx.dispatcher.invoke('resource', 'tasks://database');
    expect(res).toEqual({
      contents: [{ uri: 'tasks://database', mimeType: 'application/json', text: JSON.stringify(ctx.tasks.snapshot(), null, 2) }],
    });
  });

  it('reads a listed note through its file:// URI', async () => {
    const listed = await ctx.dispatcher.listResources();
    const note = listed.find((r) => r.name === 'Note: mcp_basics');
    expect(note).toBeDefined();
    const uri = note?.uri ?? '';
    const res = await ctx.dispatcher.invoke('resource', uri);
    const expected = await fs.readFile(path.join(notesDir, 'mcp_basics.md'), 'utf8');
    expect(res.contents).toEqual([{ uri, mimeType: 'text/markdown', text: expected }]);
  });

  it('reports a missing note file as text', async () => {
    const missing = path.join(notesDir, 'missing.md');
    const res = await ctx.dispatcher.invoke('resource', `file://${missing}`);
    expect(res.contents).toEqual([{ uri: `file://${missing}`, mimeType: 'text/plain', text: `File not found: ${missing}` }]);
  });

  it('uses the URI remainder verbatim, so .. segments leave the notes directory', async () => {
    await fs.writeFile(path.join(TMP, 'outside.md'), 'outside the notes dir', 'utf8');
    const res = await ctx.dispatcher.invoke('resource', `file://${notesDir}/../outside.md`);
    expect(res.contents[0].text).toBe('outside the notes dir');
  });

  it('describes the running process under system://info', async () => {
    const res = await ctx.dispatcher.invoke('resource', 'system://info');
    expect(res.contents[0].uri).toBe('system://info');
    const info: unknown = JSON.parse(res.contents[0].text);
    expect(info).toMatchObject({
      server_name: 'test-server',
      platform: process.platform,
      working_directory: process.cwd(),
      node_version: process.version,
    });
  });

  it('fails hard on an unknown URI', async () => {
    await expect(ctx.dispatcher.invoke('resource', 'notes://mcp_basics')).rejects.toThrow('Unknown resource URI: notes://mcp_basics');
  });
});

describe('dispatcher: prompts', () => {
  it('task_summary includes every task by default', async () => {
    const res = await ctx.dispatcher.invoke('prompt', 'task_summary', {});
    expect(res.description).toBe('Task summary prompt with current task data');
    expect(res.messages).toEqual([
      {
        role: 'user',
        content: {
          type: 'text',
          text:
            'Please provide a comprehensive summary of all tasks (completed and pending).\n\nCurrent tasks data:\n' +
            JSON.stringify(ctx.tasks.snapshot(), null, 2),
        },
      },
    ]);
  });

  it('task_summary narrows to pending tasks unless include_completed is "true" in any case', async () => {
    const pending = 'Please provide a summary of pending tasks only.\n\nCurrent tasks data:\n' + JSON.stringify(PENDING_SEED, null, 2);
    for (const flag of ['false', 'FALSE', 'no']) {
      const res = await ctx.dispatcher.invoke('prompt', 'task_summary', { include_completed: flag });
      expect(res.messages[0].content.text).toBe(pending);
    }
    const all = await ctx.dispatcher.invoke('prompt', 'task_summary', { include_completed: 'True' });
    expect(all.messages[0].content.text.startsWith('Please provide a comprehensive summary')).toBe(true);
  });

  it('learning_plan fills in the default focus area', async () => {
    const res = await ctx.dispatcher.invoke('prompt', 'learning_plan', { skill_level: 'beginner' });
    expect(res.description).toBe('Personalized MCP learning plan for beginner level');
    const lines = res.messages[0].content.text.split('\n');
    expect(lines[2]).toBe('Skill Level: beginner');
    expect(lines[3]).toBe('Focus Area: general MCP concepts');
  });

  it('explain_concept quotes the concept', async () => {
    const res = await ctx.dispatcher.invoke('prompt', 'explain_concept', { concept: 'resources' });
    expect(res.description).toBe('Detailed explanation of MCP concept: resources');
    expect(res.messages[0].content.text.split('\n')[0]).toBe('Please provide a detailed explanation of the MCP concept: "resources"');
  });

  it('fails hard on an unknown prompt', async () => {
    const err = await ctx.dispatcher.invoke('prompt', 'haiku', {}).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UnknownCapabilityError);
    expect(err instanceof UnknownCapabilityError && err.kind).toBe('prompt');
    expect(err instanceof UnknownCapabilityError && err.capability).toBe('haiku');
  });
});
