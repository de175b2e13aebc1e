import type { Command } from 'commander';
import chalk from 'chalk';
import { buildHarvestConfig, resolveApiUrl } from '../config.js';
import { runHarvest } from '../pipeline.js';

interface CollectOptions {
  location: string;
  minFollowers: string;
  maxPages: string;
  maxRepos: string;
  delay: string;
  out: string;
  apiUrl?: string;
}

export function parseCount(flag: string, raw: string, min = 0): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    console.error(chalk.red(`Invalid ${flag}: ${raw} (expected an integer >= ${min})`));
    process.exit(1);
  }
  return value;
}

export function registerCollectCommand(program: Command): void {
  program
    .command('collect')
    .description('Search users by location and followers, fetch profiles and repositories, write CSV files')
    .option('--location <name>', 'Exact location filter', 'Tokyo')
    .option('--min-followers <n>', 'Only users with more followers than this', '200')
    .option('--max-pages <n>', 'Search result pages to fetch (100 users each)', '10')
    .option('--max-repos <n>', 'Repositories to keep per user', '500')
    .option('--delay <ms>', 'Pause between pages of one listing', '1000')
    .option('--out <dir>', 'Output directory for users.csv and repositories.csv', '.')
    .option('--api-url <url>', 'GitHub API base URL (or GITHUB_API_URL env)')
    .action(async (opts: CollectOptions) => {
      const config = buildHarvestConfig({
        apiUrl: resolveApiUrl(opts.apiUrl),
        location: opts.location,
        minFollowers: parseCount('--min-followers', opts.minFollowers),
        maxUserPages: parseCount('--max-pages', opts.maxPages, 1),
        maxReposPerUser: parseCount('--max-repos', opts.maxRepos),
        pageDelayMs: parseCount('--delay', opts.delay),
        outDir: opts.out,
      });

      try {
        const summary = await runHarvest({ config });
        console.log(chalk.green('\nData collection and processing completed successfully!'));
        console.log(`  Users found:    ${summary.usersFound}`);
        console.log(`  Users exported: ${summary.usersExported}`);
        console.log(`  Users skipped:  ${summary.skippedLogins.length}`);
        console.log(`  Repositories:   ${summary.repositoriesExported}`);
        console.log(`  Search stopped: ${summary.userSearchStop}`);
      } catch (err) {
        console.error(chalk.red(`Collect failed: ${err instanceof Error ? err.message : err}`));
        process.exit(1);
      }
    });
}
