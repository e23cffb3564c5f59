import type { TaskStore } from '../storage/tasks.js';
import type { Task } from '../types.js';

export const NO_TASKS_MESSAGE = 'No tasks found.';

export function statusMarker(task: Task): string {
  return task.completed ? '✅' : '⏳';
}

export function renderTaskLine(task: Task): string {
  return `${statusMarker(task)} [${task.id}] ${task.title} (created: ${task.created})`;
}

export function renderTaskList(tasks: Task[]): string {
  if (tasks.length === 0) return NO_TASKS_MESSAGE;
  let out = 'Current Tasks:\n';
  for (const t of tasks) out += `${renderTaskLine(t)}\n`;
  return out;
}

export function addTask(store: TaskStore, title: string, description?: string): string {
  const task = store.add(title, description);
  return `Task '${title}' added with ID ${task.id}`;
}

export function completeTask(store: TaskStore, id: unknown): string {
  const res = store.complete(id);
  if (!res.ok) return `Task with ID ${String(res.id)} not found.`;
  return `Task '${res.task.title}' marked as completed!`;
}
