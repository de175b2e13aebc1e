#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { registerCommands } from './commands/index.js';

const program = new Command();

program
  .name('gh-harvest')
  .description('Collect GitHub users by location and follower count, with their repositories, into CSV files')
  .version('0.1.0');

registerCommands(program);

program.parse();
