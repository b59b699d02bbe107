#!/usr/bin/env node

/**
 * RetryKit CLI - Command-line demo for the retry engine
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { setupDemoCommand } from './commands/demo.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read package.json for version
const packageJson = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8')) as {
  version: string;
};

const program = new Command();

program
  .name('retrykit')
  .description('RetryKit - retry flaky operations with exponential backoff')
  .version(packageJson.version);

setupDemoCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
