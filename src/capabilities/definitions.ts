import { z } from 'zod';
import { explainConcept, learningPlan, taskSummary } from '../prompts/templates.js';
import { readNoteUri, readSystemInfo, readTasksDatabase, SYSTEM_INFO_URI, TASKS_URI } from '../resources/handlers.js';
import { NOTE_URI_PREFIX } from '../storage/notes.js';
import { calculate } from '../tools/calculator.js';
import { addTask, completeTask, renderTaskList } from '../tools/tasks.js';
import { renderWeather } from '../tools/weather.js';
import { text } from '../utils/respond.js';
import { CapabilityRegistry } from './registry.js';
import type { PromptCapability, ResourceCapability, ToolCapability } from './registry.js';

// Arguments are checked against `args` by the transport before dispatch. Handlers
// only coerce what arrives; a missing value is passed on as-is.
const str = (v: unknown): string => (typeof v === 'string' ? v : String(v));
const optStr = (v: unknown): string | undefined => (v === undefined ? undefined : str(v));

export const TOOLS: ToolCapability[] = [
  {
    kind: 'tool',
    name: 'add_task',
    title: 'Add Task',
    description: 'Add a new task to the task list',
    args: {
      title: z.string().describe('The task title'),
      description: z.string().optional().describe('Optional task description'),
    },
    handler: (args, ctx) => text(addTask(ctx.tasks, str(args.title), optStr(args.description))),
  },
  {
    kind: 'tool',
    name: 'list_tasks',
    title: 'List Tasks',
    description: 'List all tasks with their status',
    args: {},
    handler: (_args, ctx) => text(renderTaskList(ctx.tasks.list())),
  },
  {
    kind: 'tool',
    name: 'complete_task',
    title: 'Complete Task',
    description: 'Mark a task as completed',
    args: {
      task_id: z.number().int().describe('The ID of the task to complete'),
    },
    handler: (args, ctx) => text(completeTask(ctx.tasks, args.task_id)),
  },
  {
    kind: 'tool',
    name: 'get_weather',
    title: 'Get Weather',
    description: 'Get current weather information (simulated)',
    args: {
      city: z.string().describe('The city name'),
    },
    handler: (args) => text(renderWeather(str(args.city))),
  },
  {
    kind: 'tool',
    name: 'calculate',
    title: 'Calculate',
    description: 'Perform basic mathematical calculations',
    args: {
      expression: z.string().describe('Mathematical expression to evaluate'),
    },
    handler: (args) => text(calculate(str(args.expression))),
  },
];

export const RESOURCES: ResourceCapability[] = [
  {
    kind: 'resource',
    uri: TASKS_URI,
    name: 'Task Database',
    description: 'Current task list with completion status',
    mimeType: 'application/json',
    handler: (uri, ctx) => readTasksDatabase(ctx.tasks, uri),
  },
  {
    kind: 'resource-prefix',
    prefix: NOTE_URI_PREFIX,
    name: 'Notes',
    description: 'Markdown learning notes from the notes directory',
    mimeType: 'text/markdown',
    list: async (ctx) =>
      (await ctx.notes.list()).map((n) => ({
        uri: n.uri,
        name: `Note: ${n.stem}`,
        title: n.title,
        description: n.description ?? `Learning note about ${n.stem.replace(/_/g, ' ')}`,
        mimeType: 'text/markdown',
      })),
    handler: (uri, rest, ctx) => readNoteUri(ctx.notes, uri, rest),
  },
  {
    kind: 'resource',
    uri: SYSTEM_INFO_URI,
    name: 'System Information',
    description: 'Current system date and time information',
    mimeType: 'application/json',
    handler: (uri, ctx) => readSystemInfo(ctx.serverName, uri),
  },
];

export const PROMPTS: PromptCapability[] = [
  {
    kind: 'prompt',
    name: 'task_summary',
    title: 'Task Summary',
    description: 'Generate a summary of current tasks',
    args: {
      include_completed: z.string().optional().describe('Whether to include completed tasks'),
    },
    handler: (args, ctx) => taskSummary(ctx.tasks, optStr(args.include_completed)),
  },
  {
    kind: 'prompt',
    name: 'learning_plan',
    title: 'Learning Plan',
    description: 'Create a personalized MCP learning plan',
    args: {
      skill_level: z.string().describe('Current skill level (beginner, intermediate, advanced)'),
      focus_area: z.string().optional().describe('Specific area to focus on (tools, resources, prompts, etc.)'),
    },
    handler: (args) => learningPlan(str(args.skill_level), optStr(args.focus_area)),
  },
  {
    kind: 'prompt',
    name: 'explain_concept',
    title: 'Explain Concept',
    description: 'Explain an MCP concept in detail',
    args: {
      concept: z.string().describe('The MCP concept to explain (tools, resources, prompts, servers, clients)'),
    },
    handler: (args) => explainConcept(str(args.concept)),
  },
];

export function createRegistry(): CapabilityRegistry {
  const registry = new CapabilityRegistry();
  for (const t of TOOLS) registry.registerTool(t);
  for (const r of RESOURCES) registry.registerResource(r);
  for (const p of PROMPTS) registry.registerPrompt(p);
  return registry;
}
