// Flat export records for gh-harvest.
// Every field is always present; absent source values become '' or 0.

import type { StopReason } from '../connectors/base/types.js';

/** "true" | "false" | "" where "" means unknown. */
export type TriState = 'true' | 'false' | '';

export interface UserRecord {
  login: string;
  name: string;
  company: string;
  location: string;
  email: string;
  hireable: TriState;
  bio: string;
  public_repos: number;
  followers: number;
  following: number;
  created_at: string;
}

export interface RepositoryRecord {
  login: string;
  full_name: string;
  created_at: string;
  stargazers_count: number;
  watchers_count: number;
  language: string;
  has_projects: TriState;
  has_wiki: TriState;
  license_name: string;
}

export const USER_COLUMNS = [
  'login',
  'name',
  'company',
  'location',
  'email',
  'hireable',
  'bio',
  'public_repos',
  'followers',
  'following',
  'created_at',
] as const satisfies readonly (keyof UserRecord)[];

export const REPOSITORY_COLUMNS = [
  'login',
  'full_name',
  'created_at',
  'stargazers_count',
  'watchers_count',
  'language',
  'has_projects',
  'has_wiki',
  'license_name',
] as const satisfies readonly (keyof RepositoryRecord)[];

export interface HarvestSummary {
  usersFound: number;
  usersExported: number;
  skippedLogins: string[];
  repositoriesExported: number;
  userSearchStop: StopReason;
  usersFile: string;
  repositoriesFile: string;
}
