import type { CompleteOutcome, Task } from '../types.js';

export const SEED_TASKS: ReadonlyArray<Task> = [
  { id: 1, title: 'Learn MCP basics', completed: false, created: '2025-08-15' },
  { id: 2, title: 'Build a simple tool', completed: true, created: '2025-08-14' },
  { id: 3, title: 'Understand resources', completed: false, created: '2025-08-15' },
];

// Local calendar date, YYYY-MM-DD
export function formatDate(d: Date): string {
  const mm = String(d.getMonth() + 1).padStart(2, '0');
  const dd = String(d.getDate()).padStart(2, '0');
  return `${d.getFullYear()}-${mm}-${dd}`;
}

export interface TaskStoreOptions {
  seed?: ReadonlyArray<Task>;
  clock?: () => Date;
}

/**
 * Ordered, process-local task list. Owned by whoever constructs it and handed to
 * capability handlers by reference; nothing here is shared through module state.
 *
 * Tasks are only ever appended or flipped to completed. Ids continue from
 * the highest seeded id, and since nothing is removed an id is never handed out twice.
 */
export class TaskStore {
  private readonly tasks: Task[];
  private readonly clock: () => Date;
  private nextId: number;

  constructor(opts: TaskStoreOptions = {}) {
    this.tasks = (opts.seed ?? []).map((t) => ({ ...t }));
    this.clock = opts.clock ?? (() => new Date());
    this.nextId = this.tasks.reduce((max, t) => Math.max(max, t.id), 0) + 1;
  }

  add(title: string, description = ''): Task {
    const id = this.nextId++;
    const task: Task = {
      id,
      title,
      description,
      completed: false,
      created: formatDate(this.clock()),
    };
    this.tasks.push(task);
    return { ...task };
  }

  list(): Task[] {
    return this.tasks.map((t) => ({ ...t }));
  }

  pending(): Task[] {
    return this.tasks.filter((t) => !t.completed).map((t) => ({ ...t }));
  }

  // `id` is whatever the caller sent; matching is strict equality, as with the stored numbers
  complete(id: unknown): CompleteOutcome {
    const task = this.tasks.find((t) => t.id === id);
    if (!task) return { ok: false, id };
    task.completed = true;
    return { ok: true, task: { ...task } };
  }

  snapshot(): Task[] {
    return this.list();
  }

  get size(): number {
    return this.tasks.length;
  }
}
