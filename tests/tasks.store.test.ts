import { describe, it, expect } from 'vitest';
import { formatDate, SEED_TASKS, TaskStore } from '../src/storage/tasks.js';
import { addTask, completeTask, NO_TASKS_MESSAGE, renderTaskList } from '../src/tools/tasks.js';

const fixedClock = () => new Date(2026, 0, 5, 9, 30);

describe('TaskStore', () => {
  it('assigns max(existing)+1 to new tasks, starting after the seed', () => {
    const store = new TaskStore({ seed: SEED_TASKS, clock: fixedClock });
    const t = store.add('Write tests', 'cover the store');
    expect(t).toEqual({ id: 4, title: 'Write tests', description: 'cover the store', completed: false, created: '2026-01-05' });
    expect(store.size).toBe(4);
  });

  it('starts at 1 on an empty store and defaults description to empty', () => {
    const store = new TaskStore({ clock: fixedClock });
    expect(store.add('First')).toEqual({ id: 1, title: 'First', description: '', completed: false, created: '2026-01-05' });
  });

  it('hands out strictly increasing, unique ids', () => {
    const store = new TaskStore({ seed: SEED_TASKS });
    const ids = Array.from({ length: 25 }, (_, i) => store.add(`t${i}`).id);
    for (let i = 1; i < ids.length; i++) expect(ids[i]).toBeGreaterThan(ids[i - 1]);
    const all = store.list().map((t) => t.id);
    expect(new Set(all).size).toBe(all.length);
  });

  it('continues from the highest id, not the count', () => {
    const store = new TaskStore({ seed: [{ id: 10, title: 'x', completed: false, created: '2025-01-01' }] });
    expect(store.add('y').id).toBe(11);
  });

  it('adds to a very large store', () => {
    const seed = Array.from({ length: 200_000 }, (_, i) => ({ id: i + 1, title: `t${i}`, completed: false, created: '2025-01-01' }));
    const store = new TaskStore({ seed });
    expect(store.add('x').id).toBe(200_001);
    expect(store.add('y').id).toBe(200_002);
  });

  it('completing an unknown id leaves the store untouched and reports the id', () => {
    const store = new TaskStore({ seed: SEED_TASKS });
    const before = store.snapshot();
    expect(store.complete(99)).toEqual({ ok: false, id: 99 });
    expect(store.snapshot()).toEqual(before);
  });

  it('completion only flips to true and is idempotent', () => {
    const store = new TaskStore({ seed: SEED_TASKS });
    const first = store.complete(1);
    expect(first.ok && first.task.completed).toBe(true);
    const again = store.complete(1);
    expect(again.ok && again.task.completed).toBe(true);
    expect(store.list().find((t) => t.id === 1)?.completed).toBe(true);
  });

  it('matches ids strictly, so a numeric string does not complete a task', () => {
    const store = new TaskStore({ seed: SEED_TASKS });
    expect(store.complete('1')).toEqual({ ok: false, id: '1' });
    expect(store.pending().map((t) => t.id)).toEqual([1, 3]);
  });

  it('returns copies, so callers cannot mutate the store', () => {
    const store = new TaskStore({ seed: SEED_TASKS });
    const listed = store.list();
    listed[0].completed = true;
    listed.push({ id: 50, title: 'sneaky', completed: false, created: '2025-01-01' });
    expect(store.snapshot()).toEqual(SEED_TASKS);
  });

  it('does not share seed objects between stores', () => {
    const a = new TaskStore({ seed: SEED_TASKS });
    const b = new TaskStore({ seed: SEED_TASKS });
    a.complete(3);
    expect(b.pending().map((t) => t.id)).toEqual([1, 3]);
    expect(SEED_TASKS[2].completed).toBe(false);
  });

  it('formats local calendar dates with zero padding', () => {
    expect(formatDate(new Date(2025, 7, 4))).toBe('2025-08-04');
    expect(formatDate(new Date(2025, 11, 31, 23, 59))).toBe('2025-12-31');
  });
});

describe('task tool rendering', () => {
  it('renders the empty-state message for an empty store', () => {
    expect(renderTaskList(new TaskStore().list())).toBe(NO_TASKS_MESSAGE);
    expect(NO_TASKS_MESSAGE).toBe('No tasks found.');
  });

  it('renders one line per task with id, title and a status marker', () => {
    const store = new TaskStore({ seed: SEED_TASKS });
    expect(renderTaskList(store.list())).toBe(
      'Current Tasks:\n' +
        '⏳ [1] Learn MCP basics (created: 2025-08-15)\n' +
        '✅ [2] Build a simple tool (created: 2025-08-14)\n' +
        '⏳ [3] Understand resources (created: 2025-08-15)\n',
    );
  });

  it('reports adds and completions as text', () => {
    const store = new TaskStore({ seed: SEED_TASKS, clock: fixedClock });
    expect(addTask(store, 'Write docs')).toBe("Task 'Write docs' added with ID 4");
    expect(completeTask(store, 4)).toBe("Task 'Write docs' marked as completed!");
    expect(completeTask(store, 42)).toBe('Task with ID 42 not found.');
    expect(renderTaskList(store.list()).split('\n')[4]).toBe('✅ [4] Write docs (created: 2026-01-05)');
  });
});
