import { join } from 'path';
import chalk from 'chalk';

export interface HarvestConfig {
  apiUrl: string;
  location: string;
  minFollowers: number;
  /** Search API page size (GitHub maximum: 100). */
  usersPerPage: number;
  /** Search API returns at most 1000 results, i.e. 10 pages of 100. */
  maxUserPages: number;
  reposPerPage: number;
  maxReposPerUser: number;
  /** Fixed pause between consecutive pages of one paginated fetch. */
  pageDelayMs: number;
  outDir: string;
  usersFile: string;
  repositoriesFile: string;
}

export const DEFAULT_API_URL = 'https://api.github.com';

const DEFAULT_CONFIG: HarvestConfig = {
  apiUrl: DEFAULT_API_URL,
  location: 'Tokyo',
  minFollowers: 200,
  usersPerPage: 100,
  maxUserPages: 10,
  reposPerPage: 100,
  maxReposPerUser: 500,
  pageDelayMs: 1000,
  outDir: '.',
  usersFile: 'users.csv',
  repositoriesFile: 'repositories.csv',
};

export function buildHarvestConfig(overrides: Partial<HarvestConfig> = {}): Readonly<HarvestConfig> {
  return Object.freeze({ ...DEFAULT_CONFIG, ...overrides });
}

/** `--api-url`, then GITHUB_API_URL, then api.github.com. */
export function resolveApiUrl(flag?: string, env: NodeJS.ProcessEnv = process.env): string {
  return flag?.trim() || env.GITHUB_API_URL?.trim() || DEFAULT_API_URL;
}

export function usersPath(config: HarvestConfig): string {
  return join(config.outDir, config.usersFile);
}

export function repositoriesPath(config: HarvestConfig): string {
  return join(config.outDir, config.repositoriesFile);
}

/**
 * Read GITHUB_TOKEN. A missing or blank token is the only fatal error:
 * the process exits before any request is made.
 */
export function resolveToken(env: NodeJS.ProcessEnv = process.env): string {
  const token = env.GITHUB_TOKEN?.trim();
  if (!token) {
    console.error(chalk.red('Error: GitHub Personal Access Token (PAT) not found in environment variables.'));
    console.error(chalk.red("Please set the 'GITHUB_TOKEN' environment variable and try again."));
    process.exit(1);
  }
  return token;
}
