#!/usr/bin/env node
import { runCLI } from './index.js';
import { formatCliError } from '../errors.js';

runCLI().catch((error: unknown) => {
  console.error(`\n${formatCliError(error instanceof Error ? error : new Error(String(error)))}\n`);
  process.exit(1);
});
