import type { TaskStore } from '../storage/tasks.js';
import type { PromptResult } from '../types.js';
import { json, userPrompt } from '../utils/respond.js';

export const DEFAULT_FOCUS_AREA = 'general MCP concepts';

// include_completed arrives as a string; anything other than "true" (any case) means pending only
export function taskSummary(store: TaskStore, includeCompleted: string = 'true'): PromptResult {
  const all = includeCompleted.toLowerCase() === 'true';
  const tasks = all ? store.snapshot() : store.pending();
  const lead = all
    ? 'Please provide a comprehensive summary of all tasks (completed and pending).'
    : 'Please provide a summary of pending tasks only.';
  return userPrompt(
    'Task summary prompt with current task data',
    `${lead}\n\nCurrent tasks data:\n${json(tasks)}`,
  );
}

export function learningPlan(skillLevel: string, focusArea: string = DEFAULT_FOCUS_AREA): PromptResult {
  const body = `Create a personalized learning plan for MCP (Model Context Protocol) based on the following:

Skill Level: ${skillLevel}
Focus Area: ${focusArea}

Please provide:
1. Learning objectives appropriate for this skill level
2. Recommended sequence of topics to study
3. Practical exercises to reinforce learning
4. Resources for further reading
5. Expected timeline for mastery

Consider the current MCP server capabilities available in this playground environment.`;
  return userPrompt(`Personalized MCP learning plan for ${skillLevel} level`, body);
}

export function explainConcept(concept: string): PromptResult {
  const body = `Please provide a detailed explanation of the MCP concept: "${concept}"

Include:
1. Definition and purpose
2. How it works in the MCP architecture
3. Real-world use cases and examples
4. Best practices for implementation
5. Common pitfalls to avoid
6. How it relates to other MCP concepts

Use examples from this MCP learning server where relevant to illustrate the concepts.`;
  return userPrompt(`Detailed explanation of MCP concept: ${concept}`, body);
}
