import type { Command } from 'commander';
import chalk from 'chalk';
import { resolveApiUrl, resolveToken } from '../config.js';
import { createClient } from '../connectors/base/client.js';
import { fetchRateLimit } from '../connectors/github.js';

export function registerVerifyCommand(program: Command): void {
  program
    .command('verify')
    .description('Check the GitHub token and show the remaining API quota')
    .option('--api-url <url>', 'GitHub API base URL (or GITHUB_API_URL env)')
    .action(async (opts: { apiUrl?: string }) => {
      const token = resolveToken();
      const baseUrl = resolveApiUrl(opts.apiUrl);
      console.log(chalk.cyan(`\nVerifying token against ${baseUrl}...\n`));

      const rate = await fetchRateLimit(createClient({ baseUrl, token }));
      const core = rate?.resources?.core;
      if (!core) {
        console.error(chalk.red('  ✗ Token check failed\n'));
        process.exit(1);
      }

      console.log(chalk.green('  ✓ Token accepted'));
      console.log(`  Core quota:   ${core.remaining ?? '?'} / ${core.limit ?? '?'}`);
      if (core.reset !== undefined) {
        console.log(`  Resets at:    ${new Date(core.reset * 1000).toISOString()}`);
      }
      const search = rate?.resources?.search;
      if (search) {
        console.log(`  Search quota: ${search.remaining ?? '?'} / ${search.limit ?? '?'}`);
      }
      console.log('');
    });
}
