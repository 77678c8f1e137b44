#!/usr/bin/env node

import { Command } from 'commander';
import { batchCommand } from './commands/batch.js';
import { runCommand } from './commands/run.js';
import { forgetCommand, stateCommand } from './commands/state.js';
import { testEmailCommand } from './commands/test-email.js';

const program = new Command();

program
  .name('listing-alerts')
  .description('Watch real-estate searches and e-mail new listings')
  .version('0.1.0');

// Crawling
program.addCommand(runCommand);
program.addCommand(batchCommand);

// State
program.addCommand(stateCommand);
program.addCommand(forgetCommand);

// Delivery
program.addCommand(testEmailCommand);

program.parseAsync().catch(error => {
  console.error(error);
  process.exit(1);
});
