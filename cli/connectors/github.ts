import chalk from 'chalk';
import type { HarvestConfig } from '../config.js';
import { paginateLinks, type PaginateResult } from './base/pagination.js';
import type { ApiFailure } from './base/types.js';
import type { GitHubClient } from './base/client.js';

// ---- GitHub API types ----
// Only the fields the export reads. Any of them may be missing or null.

export interface GitHubSearchUser {
  login?: string;
  id?: number;
  type?: string;
}

export interface GitHubUserSearchPage {
  total_count?: number;
  incomplete_results?: boolean;
  items?: GitHubSearchUser[];
}

export interface GitHubUserDetails {
  login?: string;
  name?: string | null;
  company?: string | null;
  location?: string | null;
  email?: string | null;
  hireable?: boolean | null;
  bio?: string | null;
  public_repos?: number;
  followers?: number;
  following?: number;
  created_at?: string;
}

export interface GitHubLicense {
  key?: string;
  name?: string;
  spdx_id?: string | null;
}

export interface GitHubRepository {
  full_name?: string;
  created_at?: string;
  stargazers_count?: number;
  watchers_count?: number;
  language?: string | null;
  has_projects?: boolean;
  has_wiki?: boolean;
  license?: GitHubLicense | null;
}

export interface GitHubRateLimit {
  resources?: {
    core?: { limit?: number; remaining?: number; reset?: number; used?: number };
    search?: { limit?: number; remaining?: number; reset?: number; used?: number };
  };
}

function logFailure(context: string, failure: ApiFailure): void {
  console.error(chalk.red(`${context}: ${failure.status} - ${failure.body}`));
}

/** Search hits, or none when the body is null or `items` is not an array. */
export function searchItems(data: GitHubUserSearchPage | null): GitHubSearchUser[] {
  const items = data?.items;
  return Array.isArray(items) ? items : [];
}

export function buildUserQuery(location: string, minFollowers: number): string {
  return `location:"${location}" followers:>${minFollowers}`;
}

// ---- Fetchers ----

/** Search users by location and follower count, up to `config.maxUserPages` pages. */
export async function fetchUsers(
  client: GitHubClient,
  config: HarvestConfig,
  sleepFn?: (ms: number) => Promise<void>,
): Promise<PaginateResult<GitHubSearchUser>> {
  const q = buildUserQuery(config.location, config.minFollowers);

  return paginateLinks<GitHubSearchUser, GitHubUserSearchPage | null>({
    fetchPage: page => client.get<GitHubUserSearchPage | null>('/search/users', {
      q,
      per_page: config.usersPerPage,
      page,
    }),
    getItems: searchItems,
    maxPages: config.maxUserPages,
    delayMs: config.pageDelayMs,
    sleepFn,
    onPage: (page, items) => console.log(`Fetched page ${page} with ${items.length} users.`),
    onError: (page, failure) => logFailure(`Error fetching users (Page ${page})`, failure),
  });
}

/**
 * Full profile for one user, or null when the request fails or the body is
 * empty. Callers skip the user on null.
 */
export async function fetchUserDetails(
  client: GitHubClient,
  login: string,
): Promise<GitHubUserDetails | null> {
  const res = await client.get<GitHubUserDetails | null>(`/users/${encodeURIComponent(login)}`);
  if (!res.ok) {
    logFailure(`Error fetching details for ${login}`, res);
    return null;
  }
  const details = res.data;
  if (typeof details !== 'object' || details === null || Array.isArray(details) || Object.keys(details).length === 0) {
    console.error(chalk.red(`Error fetching details for ${login}: empty profile`));
    return null;
  }
  return details;
}

/** Repositories owned by `login`, most recently pushed first, at most `config.maxReposPerUser`. */
export async function fetchRepositories(
  client: GitHubClient,
  login: string,
  config: HarvestConfig,
  sleepFn?: (ms: number) => Promise<void>,
): Promise<PaginateResult<GitHubRepository>> {
  return paginateLinks<GitHubRepository, GitHubRepository[] | null>({
    fetchPage: page => client.get<GitHubRepository[] | null>(`/users/${encodeURIComponent(login)}/repos`, {
      per_page: config.reposPerPage,
      page,
      sort: 'pushed',
      direction: 'desc',
    }),
    getItems: data => (Array.isArray(data) ? data : []),
    maxItems: config.maxReposPerUser,
    stopOnEmpty: true,
    delayMs: config.pageDelayMs,
    sleepFn,
    onError: (_page, failure) => logFailure(`Error fetching repos for ${login}`, failure),
  });
}

export async function fetchRateLimit(client: GitHubClient): Promise<GitHubRateLimit | null> {
  const res = await client.get<GitHubRateLimit>('/rate_limit');
  if (!res.ok) {
    logFailure('Error fetching rate limit', res);
    return null;
  }
  return res.data;
}
