#!/usr/bin/env node

/**
 * ui-harness CLI entry point.
 * Thin wrapper: option parsing here, everything else in the library.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerEnvCommand, registerRunCommand, registerSetupCommand } from './commands.js';

const program = new Command();

program
  .name('ui-harness')
  .description('Run Playwright UI tests with harness-managed browser sessions, screenshots and reports.')
  .version('0.1.0');

registerRunCommand(program);
registerSetupCommand(program);
registerEnvCommand(program);

program.parse();
