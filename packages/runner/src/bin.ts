#!/usr/bin/env node
import path from 'node:path';

import { main } from './cli.js';
import { applyEnvFile } from './envFile.js';

async function run(): Promise<void> {
  await applyEnvFile(path.resolve(process.cwd(), '.env'));
  process.exitCode = await main(process.argv.slice(2));
}

run().catch((err: unknown) => {
  console.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  process.exitCode = 1;
});
