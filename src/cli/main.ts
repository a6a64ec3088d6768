#!/usr/bin/env node

/**
 * plainstep CLI entry point.
 * Thin wrapper; all logic is delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerCompileCommand } from './compile.js';
import { registerRunCommand } from './run.js';

const program = new Command();

program
  .name('plainstep')
  .description(
    'Plain-English browser test runner. Compile near-English steps, resolve elements without selectors, execute with Playwright.',
  )
  .version('0.1.0');

registerRunCommand(program);
registerCompileCommand(program);

await program.parseAsync();
