import path from 'node:path';
import { fileURLToPath } from 'node:url';
import fg from 'fast-glob';
import matter from 'gray-matter';
import { appendText, ensureDir, isFile, readText, writeText } from '../fs.js';
import type { NoteEntry, NoteReadOutcome } from '../types.js';

const HERE_DIR = path.dirname(fileURLToPath(import.meta.url));
// Seed notes ship with the package: <root>/seed/notes (same depth from src/ and dist/)
export const SEED_NOTES_DIR = path.resolve(HERE_DIR, '..', '..', 'seed', 'notes');

export const NOTE_URI_PREFIX = 'file://';

export function noteUri(p: string): string {
  return `${NOTE_URI_PREFIX}${p}`;
}

function frontMatter(raw: string, file: string): { title?: string; description?: string } {
  try {
    const { data } = matter(raw);
    return {
      title: typeof data.title === 'string' ? data.title : undefined,
      description: typeof data.description === 'string' ? data.description : undefined,
    };
  } catch (e) {
    console.warn(`[notes] Ignoring unreadable front matter in ${file}:`, e instanceof Error ? e.message : String(e));
    return {};
  }
}

export class NoteStore {
  constructor(readonly dir: string) {}

  // Copies every seed note into the notes directory, overwriting same-named files
  async seed(seedDir: string = SEED_NOTES_DIR): Promise<string[]> {
    await ensureDir(this.dir);
    const names = await fg('*.md', { cwd: seedDir, onlyFiles: true });
    names.sort();
    for (const name of names) {
      await writeText(path.join(this.dir, name), await readText(path.join(seedDir, name)));
    }
    return names;
  }

  // Re-scans on every call so files added between calls show up
  async list(): Promise<NoteEntry[]> {
    let names: string[];
    try {
      names = await fg('*.md', { cwd: this.dir, onlyFiles: true });
    } catch (e) {
      console.warn(`[notes] Failed to scan ${this.dir}:`, e instanceof Error ? e.message : String(e));
      return [];
    }
    names.sort();
    const out: NoteEntry[] = [];
    for (const name of names) {
      const p = path.join(this.dir, name);
      const entry: NoteEntry = { name, stem: path.basename(name, '.md'), path: p, uri: noteUri(p) };
      const read = await this.readPath(p);
      if (read.ok) {
        const fm = frontMatter(read.text, p);
        if (fm.title) entry.title = fm.title;
        if (fm.description) entry.description = fm.description;
      }
      out.push(entry);
    }
    return out;
  }

  async read(name: string): Promise<NoteReadOutcome> {
    return this.readPath(path.join(this.dir, name));
  }

  // Reads `p` as given: callers routing file:// URIs pass the remainder verbatim
  async readPath(p: string): Promise<NoteReadOutcome> {
    if (!(await isFile(p))) return { ok: false, path: p };
    try {
      return { ok: true, text: await readText(p) };
    } catch {
      return { ok: false, path: p };
    }
  }

  async write(name: string, text: string): Promise<string> {
    const p = path.join(this.dir, name);
    await writeText(p, text);
    return p;
  }

  async append(name: string, text: string): Promise<string> {
    const p = path.join(this.dir, name);
    await appendText(p, text);
    return p;
  }
}
