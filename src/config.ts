import fs from 'node:fs';
import { z } from 'zod';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const DEFAULT_SERVER_NAME = 'mcp-learning-server';
export const DEFAULT_NOTES_DIR = './notes';

export interface PlaygroundConfig {
  notesDir: string;
  seedNotes: boolean;
  seedTasks: boolean;
  serverName: string;
  logLevel: LogLevel;
  logStartup: boolean; // LOG_STARTUP=1 forces startup lines regardless of level
}

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

// Shape accepted from --config <file> or MCP_CONFIG_JSON
const FileConfigSchema = z.object({
  notesDir: z.string().min(1).optional(),
  seedNotes: z.boolean().optional(),
  seedTasks: z.boolean().optional(),
  serverName: z.string().min(1).optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
});
type FileConfig = z.infer<typeof FileConfigSchema>;

function getCliArg(argv: string[], name: string): string | undefined {
  const idx = argv.indexOf(name);
  if (idx >= 0 && idx + 1 < argv.length) return argv[idx + 1];
  return undefined;
}

export function parseBool(v: string | boolean | undefined, def = false): boolean {
  if (typeof v === 'boolean') return v;
  const s = String(v ?? '').toLowerCase();
  if (!s) return def;
  return ['1', 'true', 'yes', 'on'].includes(s);
}

function parseLogLevel(v: string | undefined): LogLevel | undefined {
  const s = (v ?? '').trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === s);
}

// Resolve file config source: CLI --config path first, then MCP_CONFIG_JSON
function readFileConfig(argv: string[], env: NodeJS.ProcessEnv): FileConfig {
  let raw: string | undefined;
  let source: string | undefined;
  const cliConfigPath = getCliArg(argv, '--config');
  if (cliConfigPath) {
    source = `--config ${cliConfigPath}`;
    try {
      raw = fs.readFileSync(cliConfigPath, 'utf8');
    } catch (e) {
      console.warn(`[config] Failed to read ${source}:`, e);
      return {};
    }
  } else if (env.MCP_CONFIG_JSON) {
    source = 'MCP_CONFIG_JSON';
    raw = env.MCP_CONFIG_JSON;
  }
  if (raw === undefined) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    console.warn(`[config] Failed to parse ${source}:`, e);
    return {};
  }
  const result = FileConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    console.warn(`[config] Ignoring invalid ${source}: ${issues.join('; ')}`);
    return {};
  }
  return result.data;
}

// Source order: file config -> env -> defaults
export function loadConfig(argv: string[] = process.argv, env: NodeJS.ProcessEnv = process.env): PlaygroundConfig {
  const fileConfig = readFileConfig(argv, env);

  const notesDir = fileConfig.notesDir
    || (env.NOTES_DIR && env.NOTES_DIR.trim().length > 0 ? env.NOTES_DIR : undefined)
    || DEFAULT_NOTES_DIR;

  return {
    notesDir,
    seedNotes: parseBool(fileConfig.seedNotes ?? env.SEED_NOTES, true),
    seedTasks: parseBool(fileConfig.seedTasks ?? env.SEED_TASKS, true),
    serverName: fileConfig.serverName || env.SERVER_NAME || DEFAULT_SERVER_NAME,
    logLevel: fileConfig.logLevel ?? parseLogLevel(env.LOG_LEVEL) ?? 'warn',
    logStartup: parseBool(env.LOG_STARTUP, false),
  };
}

// Default: quiet. info/debug turn on startup and per-request lines on stderr.
export function isVerbose(cfg: Pick<PlaygroundConfig, 'logLevel' | 'logStartup'>): boolean {
  return cfg.logStartup || cfg.logLevel === 'info' || cfg.logLevel === 'debug';
}
