#!/usr/bin/env node
import path from 'node:path';
import fs from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { isVerbose, loadConfig } from './config.js';
import type { PlaygroundConfig } from './config.js';
import { createContext } from './context.js';
import { createServer } from './server.js';

const HERE_DIR = path.dirname(fileURLToPath(import.meta.url));
const REPO_ROOT = path.resolve(HERE_DIR, '..');

async function getPackageVersion(): Promise<string> {
  // Prefer npm-provided env when available (npm scripts)
  const vEnv = process.env.npm_package_version;
  if (vEnv) return vEnv;
  try {
    const raw = await fs.readFile(path.join(REPO_ROOT, 'package.json'), 'utf8');
    const pkg: unknown = JSON.parse(raw);
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') return pkg.version;
  } catch {
    // fall through to the placeholder version
  }
  return '0.0.0';
}

async function main() {
  let cfg: PlaygroundConfig;
  try {
    cfg = loadConfig();
  } catch (e) {
    console.error('[startup][config] loadConfig failed:', e instanceof Error ? e.message : String(e));
    throw e;
  }
  const showStartup = isVerbose(cfg);
  const version = await getPackageVersion();
  if (showStartup) {
    console.error(`[startup] ${cfg.serverName} starting...`, { version, ts: new Date().toISOString(), pid: process.pid });
    console.error('[startup][notes]', { dir: cfg.notesDir, seedNotes: cfg.seedNotes, seedTasks: cfg.seedTasks });
  }

  const ctx = await createContext(cfg);
  const server = createServer(ctx, version);
  if (showStartup) {
    console.error('[startup][capabilities]', {
      tools: ctx.dispatcher.listTools().map((t) => t.name),
      prompts: ctx.dispatcher.listPrompts().map((p) => p.name),
      resources: (await ctx.dispatcher.listResources()).map((r) => r.uri),
    });
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
