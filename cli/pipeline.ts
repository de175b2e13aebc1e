/**
 * Harvest pipeline: search users, fetch each profile and repository list,
 * normalize, then write both CSV tables once at the end.
 *
 *   INIT → TOKEN_LOADED → USERS_FETCHED → (DETAIL_FETCHED | SKIPPED) → REPOS_FETCHED → EXPORTED → DONE
 *
 * HTTP failures never abort the run; only a missing token does (see resolveToken).
 */

import chalk from 'chalk';
import ora from 'ora';
import { repositoriesPath, resolveToken, usersPath, type HarvestConfig } from './config.js';
import { createClient, type GitHubClient } from './connectors/base/client.js';
import { fetchRepositories, fetchUserDetails, fetchUsers } from './connectors/github.js';
import { writeCsv } from './export/csv.js';
import { toRepositoryRecord, toUserRecord } from './normalize.js';
import {
  REPOSITORY_COLUMNS,
  USER_COLUMNS,
  type HarvestSummary,
  type RepositoryRecord,
  type UserRecord,
} from './schema/types.js';

export type HarvestState =
  | 'INIT'
  | 'TOKEN_LOADED'
  | 'USERS_FETCHED'
  | 'DETAIL_FETCHED'
  | 'SKIPPED'
  | 'REPOS_FETCHED'
  | 'EXPORTED'
  | 'DONE';

export interface HarvestTransition {
  state: HarvestState;
  /** Set for the per-user states. */
  login?: string;
}

export interface HarvestOptions {
  config: Readonly<HarvestConfig>;
  /** Read from GITHUB_TOKEN in `env` when omitted; a missing token exits at INIT. */
  token?: string;
  env?: NodeJS.ProcessEnv;
  /** Defaults to a client on `config.apiUrl`. */
  client?: GitHubClient;
  sleepFn?: (ms: number) => Promise<void>;
  onTransition?: (transition: HarvestTransition) => void;
}

const PROGRESS_EVERY = 10;

export async function runHarvest(options: HarvestOptions): Promise<HarvestSummary> {
  const { config, sleepFn, onTransition } = options;
  const emit = (state: HarvestState, login?: string): void => {
    onTransition?.(login === undefined ? { state } : { state, login });
  };

  emit('INIT');
  const token = options.token ?? resolveToken(options.env);
  emit('TOKEN_LOADED');
  const client = options.client ?? createClient({ baseUrl: config.apiUrl, token });

  console.log(chalk.cyan('\nStarting to fetch users...'));
  const search = await fetchUsers(client, config, sleepFn);
  const users = search.items;
  console.log(`\nTotal users fetched: ${users.length}`);
  emit('USERS_FETCHED');

  console.log(chalk.cyan('\nProcessing users and fetching detailed information...'));
  const userRecords: UserRecord[] = [];
  const repositoryRecords: RepositoryRecord[] = [];
  const skippedLogins: string[] = [];

  for (const [index, user] of users.entries()) {
    const position = index + 1;
    const login = user.login ?? '';
    console.log(`\nProcessing user ${position}/${users.length}: ${login}`);

    const details = login ? await fetchUserDetails(client, login) : null;
    if (!details) {
      console.log(chalk.yellow(`Skipping user ${login} due to error in fetching details.`));
      skippedLogins.push(login);
      emit('SKIPPED', login);
      continue;
    }
    userRecords.push(toUserRecord(details));
    emit('DETAIL_FETCHED', login);

    const repos = await fetchRepositories(client, login, config, sleepFn);
    console.log(`Fetched ${repos.items.length} repositories for user ${login}.`);
    for (const repo of repos.items) {
      repositoryRecords.push(toRepositoryRecord(login, repo));
    }
    emit('REPOS_FETCHED', login);

    if (position % PROGRESS_EVERY === 0) {
      console.log(`Processed ${position} users out of ${users.length}.`);
    }
  }

  const usersFile = usersPath(config);
  const repositoriesFile = repositoriesPath(config);

  const spinner = ora(`Saving users data to ${usersFile}...`).start();
  try {
    writeCsv(usersFile, USER_COLUMNS, userRecords);
    spinner.text = `Saving repositories data to ${repositoriesFile}...`;
    writeCsv(repositoriesFile, REPOSITORY_COLUMNS, repositoryRecords);
  } catch (err) {
    spinner.fail('Failed to write CSV output');
    throw err;
  }
  spinner.succeed(`Saved ${userRecords.length} users to ${usersFile} and ${repositoryRecords.length} repositories to ${repositoriesFile}`);
  emit('EXPORTED');

  emit('DONE');
  return {
    usersFound: users.length,
    usersExported: userRecords.length,
    skippedLogins,
    repositoriesExported: repositoryRecords.length,
    userSearchStop: search.reason,
    usersFile,
    repositoriesFile,
  };
}
