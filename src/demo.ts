#!/usr/bin/env node
import { loadConfig } from './config.js';
import { createContext } from './context.js';
import { runWalkthrough } from './walkthrough.js';

async function main() {
  const ctx = await createContext(loadConfig());
  await runWalkthrough(ctx);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
