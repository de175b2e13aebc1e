import type { Command } from 'commander';
import { registerCollectCommand } from './collect.js';
import { registerVerifyCommand } from './verify.js';

export function registerCommands(program: Command): void {
  registerCollectCommand(program);
  registerVerifyCommand(program);
}
