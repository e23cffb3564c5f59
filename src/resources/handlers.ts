import process from 'node:process';
import type { NoteStore } from '../storage/notes.js';
import type { TaskStore } from '../storage/tasks.js';
import type { ResourceResult } from '../types.js';
import { json, resourceText } from '../utils/respond.js';

export const TASKS_URI = 'tasks://database';
export const SYSTEM_INFO_URI = 'system://info';

export function readTasksDatabase(store: TaskStore, uri: string = TASKS_URI): ResourceResult {
  return resourceText(uri, json(store.snapshot()), 'application/json');
}

/**
 * Reads a note addressed as file://<path>. The remainder after the scheme is used
 * verbatim as a filesystem path, relative paths resolve against the working
 * directory, and nothing stops `..` segments. A missing file is reported as text.
 */
export async function readNoteUri(notes: NoteStore, uri: string, rest: string): Promise<ResourceResult> {
  const res = await notes.readPath(rest);
  if (!res.ok) return resourceText(uri, `File not found: ${res.path}`, 'text/plain');
  return resourceText(uri, res.text, 'text/markdown');
}

export interface SystemInfo {
  current_time: string;
  server_name: string;
  platform: string;
  working_directory: string;
  node_version: string;
}

export function systemInfo(serverName: string, now: Date = new Date()): SystemInfo {
  return {
    current_time: now.toISOString(),
    server_name: serverName,
    platform: process.platform,
    working_directory: process.cwd(),
    node_version: process.version,
  };
}

export function readSystemInfo(serverName: string, uri: string = SYSTEM_INFO_URI, now?: Date): ResourceResult {
  return resourceText(uri, json(systemInfo(serverName, now)), 'application/json');
}
