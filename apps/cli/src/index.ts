#!/usr/bin/env node

/**
 * filerelay CLI
 *
 * Usage:
 *   filerelay start     # run the relay
 *   filerelay status    # check what's running
 */

import { Command } from 'commander';
import { startCommand } from './commands/start.js';
import { statusCommand } from './commands/status.js';

const program = new Command();

program
  .name('filerelay')
  .description('Relay Telegram files of any size to Gofile')
  .version('0.1.0');

program.addCommand(startCommand);
program.addCommand(statusCommand);

program.parseAsync().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
