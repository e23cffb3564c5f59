import type { PlaygroundContext } from './context.js';
import type { PromptResult, ResourceResult, ToolResult } from './types.js';

export type Writer = (line: string) => void;

export const DEMO_NOTE_NAME = 'demo_notes.md';

export const DEMO_NOTE = `# MCP Learning Notes

Key concepts learned today:
- Tools: Functions AI can call
- Resources: Data AI can read
- Prompts: Templates for interactions

Next steps: Build more complex integrations!`;

const toolText = (r: ToolResult) => r.content.map((c) => c.text).join('\n');
const resourceText = (r: ResourceResult) => r.contents.map((c) => c.text).join('\n');
const promptText = (r: PromptResult) => r.messages.map((m) => m.content.text).join('\n');

function preview(s: string, max: number): string {
  return s.length > max ? `${s.slice(0, max)}...` : s;
}

function indent(s: string, pad = '  '): string {
  return s
    .split('\n')
    .map((l) => (l.length > 0 ? pad + l : l))
    .join('\n');
}

function heading(out: Writer, title: string, rule: string) {
  out(title);
  out(rule);
}

async function demonstrateTools(ctx: PlaygroundContext, out: Writer) {
  const { dispatcher } = ctx;
  heading(out, '🔧 MCP TOOLS DEMONSTRATION', '-'.repeat(30));
  out('Tools are functions that AI assistants can call to perform actions.');
  out('');

  out('📝 Tool: add_task');
  out(indent(toolText(await dispatcher.invoke('tool', 'add_task', { title: 'Test MCP integration' }))));
  out('');

  out('📋 Tool: list_tasks');
  out(indent(toolText(await dispatcher.invoke('tool', 'list_tasks', {})).trimEnd()));
  out('');

  out('🧮 Tool: calculate');
  out(indent(toolText(await dispatcher.invoke('tool', 'calculate', { expression: '15 + 25 * 2' }))));
  out('');

  out('🌤️ Tool: get_weather');
  out(indent(toolText(await dispatcher.invoke('tool', 'get_weather', { city: 'San Francisco' }))));
  out('');
}

async function demonstrateResources(ctx: PlaygroundContext, out: Writer) {
  const { dispatcher, notes } = ctx;
  heading(out, '📚 MCP RESOURCES DEMONSTRATION', '-'.repeat(32));
  out('Resources are data sources that AI assistants can read from.');
  out('');

  out('📊 Resource: tasks://database');
  const db = resourceText(await dispatcher.invoke('resource', 'tasks://database'));
  out(`  Task database contains ${ctx.tasks.size} tasks:`);
  out(indent(preview(db, 200)));
  out('');

  out('📝 Resource: file://<notes>/*.md');
  const before = (await notes.list()).length;
  const notePath = await notes.write(DEMO_NOTE_NAME, DEMO_NOTE);
  const after = await notes.list();
  out(`  Created note file: ${notePath}`);
  out(`  Content preview: ${preview(DEMO_NOTE, 100)}`);
  out(`  Note resources before: ${before}, after: ${after.length}`);
  const entry = after.find((n) => n.name === DEMO_NOTE_NAME);
  if (entry) out(`  Discovered as: ${entry.uri}`);
  out('');

  out('💻 Resource: system://info');
  out('  System information:');
  out(indent(resourceText(await dispatcher.invoke('resource', 'system://info'))));
  out('');
}

async function demonstratePrompts(ctx: PlaygroundContext, out: Writer) {
  const { dispatcher } = ctx;
  heading(out, '💭 MCP PROMPTS DEMONSTRATION', '-'.repeat(31));
  out('Prompts are templates that help AI assistants generate responses.');
  out('');

  out('📋 Prompt: task_summary');
  out('  Generated prompt for AI:');
  out(indent(preview(promptText(await dispatcher.invoke('prompt', 'task_summary', {})), 150)));
  out('');

  out('🎓 Prompt: learning_plan');
  out('  Generated learning prompt:');
  const plan = await dispatcher.invoke('prompt', 'learning_plan', { skill_level: 'beginner', focus_area: 'tools' });
  out(indent(preview(promptText(plan), 150)));
  out('');
}

/**
 * Narrated tour of tools, resources and prompts, driven through the same
 * dispatcher the server uses. Mutates the context: adds a task and writes
 * demo_notes.md into the notes directory.
 */
export async function runWalkthrough(ctx: PlaygroundContext, out: Writer = console.log): Promise<void> {
  heading(out, '🚀 WELCOME TO MCP LEARNING PLAYGROUND!', '='.repeat(50));
  out('Model Context Protocol (MCP) enables AI assistants to:');
  out('• Call tools to perform actions');
  out('• Read resources to access data');
  out('• Use prompts for templated interactions');
  out('');

  await demonstrateTools(ctx, out);
  await demonstrateResources(ctx, out);
  await demonstratePrompts(ctx, out);

  heading(out, '🎉 CONGRATULATIONS!', '='.repeat(20));
  out("You've seen all three core MCP concepts in action:");
  out('✅ Tools - Functions that perform actions');
  out('✅ Resources - Data sources for reading');
  out('✅ Prompts - Templates for AI interactions');
  out('');
  out('🎯 NEXT STEPS:');
  out('1. Start the server: mcp-learning-playground (stdio)');
  out('2. Connect it to an MCP client and call the tools');
  out('3. Build your own tools and resources');
  out('4. Connect to real APIs and databases');
  out('');
  out('📚 Your MCP playground is ready for experimentation!');
}
