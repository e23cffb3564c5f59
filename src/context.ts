import type { PlaygroundConfig } from './config.js';
import { createRegistry } from './capabilities/definitions.js';
import { Dispatcher } from './capabilities/dispatcher.js';
import type { CapabilityRegistry, HandlerContext } from './capabilities/registry.js';
import { NoteStore } from './storage/notes.js';
import { SEED_TASKS, TaskStore } from './storage/tasks.js';
import type { TaskStoreOptions } from './storage/tasks.js';

export interface PlaygroundContext extends HandlerContext {
  config: PlaygroundConfig;
  registry: CapabilityRegistry;
  dispatcher: Dispatcher;
}

export interface ContextOptions {
  clock?: TaskStoreOptions['clock'];
  seedNotesDir?: string; // override the packaged seed notes
}

/**
 * Builds the stores, registry and dispatcher for one process. Seeding writes the
 * seed notes into the notes directory, overwriting files of the same name.
 */
export async function createContext(config: PlaygroundConfig, opts: ContextOptions = {}): Promise<PlaygroundContext> {
  const tasks = new TaskStore({ seed: config.seedTasks ? SEED_TASKS : [], clock: opts.clock });
  const notes = new NoteStore(config.notesDir);
  if (config.seedNotes) {
    const seeded = await notes.seed(opts.seedNotesDir);
    if (config.logLevel === 'debug') console.error('[notes] seeded', { dir: notes.dir, files: seeded });
  }
  const registry = createRegistry();
  const handlerCtx: HandlerContext = { tasks, notes, serverName: config.serverName };
  const dispatcher = new Dispatcher(registry, handlerCtx, { debug: config.logLevel === 'debug' });
  return { ...handlerCtx, config, registry, dispatcher };
}
