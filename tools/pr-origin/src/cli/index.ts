#!/usr/bin/env node
import { Command } from 'commander';
import { changesCommand } from './commands/changes.js';
import { describeCommand } from './commands/describe.js';
import { resolveCommand } from './commands/resolve.js';

const program = new Command();

program
  .name('pr-origin')
  .description('Resolve GitHub pull requests into migration-ready revisions')
  .version('0.1.0');

program.addCommand(resolveCommand);
program.addCommand(describeCommand);
program.addCommand(changesCommand);

program.parse();
