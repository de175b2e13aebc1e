import type { RepositoryRecord, TriState, UserRecord } from './schema/types.js';
import type { GitHubRepository, GitHubUserDetails } from './connectors/github.js';

// ---- Field helpers ----

/**
 * Booleans become "true"/"false"; everything else, including a missing
 * value, becomes "".
 */
export function normalizeBoolean(value: unknown): TriState {
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return '';
}

/** Trim, drop one leading "@", upper-case. */
export function normalizeCompany(value: unknown): string {
  if (typeof value !== 'string' || !value) return '';
  let company = value.trim();
  if (company.startsWith('@')) company = company.slice(1);
  return company.toUpperCase();
}

export function normalizeString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

export function normalizeCount(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

export function licenseName(license: GitHubRepository['license']): string {
  if (!license) return '';
  return normalizeString(license.key);
}

// ---- Records ----

export function toUserRecord(details: GitHubUserDetails): UserRecord {
  return {
    login: normalizeString(details.login),
    name: normalizeString(details.name),
    company: normalizeCompany(details.company),
    location: normalizeString(details.location),
    email: normalizeString(details.email),
    hireable: normalizeBoolean(details.hireable),
    bio: normalizeString(details.bio),
    public_repos: normalizeCount(details.public_repos),
    followers: normalizeCount(details.followers),
    following: normalizeCount(details.following),
    created_at: normalizeString(details.created_at),
  };
}

/** `login` is the owner the listing was fetched for, not read from the payload. */
export function toRepositoryRecord(login: string, repo: GitHubRepository): RepositoryRecord {
  return {
    login,
    full_name: normalizeString(repo.full_name),
    created_at: normalizeString(repo.created_at),
    stargazers_count: normalizeCount(repo.stargazers_count),
    watchers_count: normalizeCount(repo.watchers_count),
    language: normalizeString(repo.language),
    has_projects: normalizeBoolean(repo.has_projects),
    has_wiki: normalizeBoolean(repo.has_wiki),
    license_name: licenseName(repo.license),
  };
}
