import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { buildHarvestConfig } from '../config.js';
import { runHarvest, type HarvestTransition } from '../pipeline.js';

const TEST_DIR = join(tmpdir(), 'gh-harvest-pipeline-test');
const mockFetch = vi.fn();
const noSleep = async (): Promise<void> => {};

const config = buildHarvestConfig({
  apiUrl: 'https://api.example.com',
  location: 'Tokyo',
  minFollowers: 200,
  pageDelayMs: 0,
  outDir: TEST_DIR,
});

const USERS = {
  alice: {
    login: 'alice',
    name: 'Alice Sato',
    company: ' @Mercari ',
    location: 'Tokyo, Japan',
    email: null,
    hireable: true,
    bio: null,
    public_repos: 3,
    followers: 450,
    following: 10,
    created_at: '2012-03-04T05:06:07Z',
  },
  bob: {
    login: 'bob',
    name: null,
    company: null,
    location: 'Tokyo',
    hireable: null,
    public_repos: 0,
    followers: 210,
    following: 0,
    created_at: '2015-06-07T08:09:10Z',
  },
} as const;

const ALICE_REPOS = [
  {
    full_name: 'alice/app', created_at: '2020-01-01T00:00:00Z', stargazers_count: 50, watchers_count: 50,
    language: 'TypeScript', has_projects: true, has_wiki: true, license: { key: 'mit', name: 'MIT License' },
  },
  {
    full_name: 'alice/notes', created_at: '2019-01-01T00:00:00Z', stargazers_count: 2, watchers_count: 2,
    language: null, has_projects: false, has_wiki: true, license: null,
  },
  {
    full_name: 'alice/lib', created_at: '2018-01-01T00:00:00Z', stargazers_count: 7, watchers_count: 7,
    language: 'Go', has_projects: true, has_wiki: false, license: { key: 'apache-2.0', name: 'Apache License 2.0' },
  },
];

function json(data: unknown): Response {
  return new Response(JSON.stringify(data), { status: 200, headers: { 'Content-Type': 'application/json' } });
}

/** In-process stand-in for the three GitHub endpoints. */
function serveGitHub(searchLogins: string[], unavailable: string[] = []): void {
  mockFetch.mockImplementation(async (input: string) => {
    const { pathname } = new URL(input);
    if (pathname === '/search/users') {
      return json({ total_count: searchLogins.length, items: searchLogins.map(login => ({ login })) });
    }
    const match = /^\/users\/([^/]+)(\/repos)?$/.exec(pathname);
    if (!match || unavailable.includes(match[1])) {
      return new Response('Not Found', { status: 404 });
    }
    const login = match[1];
    if (match[2]) return json(login === 'alice' ? ALICE_REPOS : []);
    return json(login === 'alice' ? USERS.alice : login === 'bob' ? USERS.bob : { login });
  });
}

function readLines(file: string): string[] {
  return readFileSync(join(TEST_DIR, file), 'utf-8').trimEnd().split('\n');
}

function requestedPaths(): string[] {
  return mockFetch.mock.calls.map(call => new URL(String(call[0])).pathname);
}

beforeEach(() => {
  if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe('runHarvest', () => {
  it('exports two users and three repositories for the Tokyo search', async () => {
    serveGitHub(['alice', 'bob']);

    const summary = await runHarvest({ config, token: 'test-token', sleepFn: noSleep });

    expect(summary).toEqual({
      usersFound: 2,
      usersExported: 2,
      skippedLogins: [],
      repositoriesExported: 3,
      userSearchStop: 'no-next-link',
      usersFile: join(TEST_DIR, 'users.csv'),
      repositoriesFile: join(TEST_DIR, 'repositories.csv'),
    });

    expect(readLines('users.csv')).toEqual([
      'login,name,company,location,email,hireable,bio,public_repos,followers,following,created_at',
      'alice,Alice Sato,MERCARI,"Tokyo, Japan",,true,,3,450,10,2012-03-04T05:06:07Z',
      'bob,,,Tokyo,,,,0,210,0,2015-06-07T08:09:10Z',
    ]);
    expect(readLines('repositories.csv')).toEqual([
      'login,full_name,created_at,stargazers_count,watchers_count,language,has_projects,has_wiki,license_name',
      'alice,alice/app,2020-01-01T00:00:00Z,50,50,TypeScript,true,true,mit',
      'alice,alice/notes,2019-01-01T00:00:00Z,2,2,,false,true,',
      'alice,alice/lib,2018-01-01T00:00:00Z,7,7,Go,true,false,apache-2.0',
    ]);

    const search = new URL(String(mockFetch.mock.calls[0][0]));
    expect(search.searchParams.get('q')).toBe('location:"Tokyo" followers:>200');
  });

  it('skips a user whose profile fetch fails, along with their repositories', async () => {
    serveGitHub(['alice', 'ghost', 'bob'], ['ghost']);

    const summary = await runHarvest({ config, token: 'test-token', sleepFn: noSleep });

    expect(summary.skippedLogins).toEqual(['ghost']);
    expect(summary.usersExported).toBe(2);
    expect(requestedPaths()).not.toContain('/users/ghost/repos');
    expect(readLines('users.csv').map(line => line.split(',')[0])).toEqual(['login', 'alice', 'bob']);
    expect(readLines('repositories.csv').filter(line => line.startsWith('ghost,'))).toEqual([]);
  });

  it('still writes both files when the search fails', async () => {
    mockFetch.mockResolvedValue(new Response('Bad credentials', { status: 401 }));

    const summary = await runHarvest({ config, token: 'test-token', sleepFn: noSleep });

    expect(summary.userSearchStop).toBe('http-error');
    expect(summary.usersFound).toBe(0);
    expect(readLines('users.csv')).toEqual([
      'login,name,company,location,email,hireable,bio,public_repos,followers,following,created_at',
    ]);
    expect(readLines('repositories.csv')).toEqual([
      'login,full_name,created_at,stargazers_count,watchers_count,language,has_projects,has_wiki,license_name',
    ]);
  });

  it('skips a user whose profile comes back empty', async () => {
    mockFetch.mockImplementation(async (input: string) => {
      const { pathname } = new URL(input);
      if (pathname === '/search/users') return json({ items: [{ login: 'alice' }] });
      if (pathname === '/users/alice') return json({});
      return json(ALICE_REPOS);
    });

    const summary = await runHarvest({ config, token: 'test-token', sleepFn: noSleep });

    expect(summary.skippedLogins).toEqual(['alice']);
    expect(summary.repositoriesExported).toBe(0);
    expect(requestedPaths()).toEqual(['/search/users', '/users/alice']);
    expect(readLines('users.csv')).toHaveLength(1);
    expect(readLines('repositories.csv')).toHaveLength(1);
  });

  it('writes both files when the search body is null', async () => {
    mockFetch.mockResolvedValueOnce(json(null));

    const summary = await runHarvest({ config, token: 'test-token', sleepFn: noSleep });

    expect(summary.usersFound).toBe(0);
    expect(summary.userSearchStop).toBe('no-next-link');
    expect(readLines('users.csv')).toEqual([
      'login,name,company,location,email,hireable,bio,public_repos,followers,following,created_at',
    ]);
    expect(readLines('repositories.csv')).toEqual([
      'login,full_name,created_at,stargazers_count,watchers_count,language,has_projects,has_wiki,license_name',
    ]);
  });

  it('reads the token from the environment when none is passed', async () => {
    serveGitHub([]);

    await runHarvest({ config, env: { GITHUB_TOKEN: ' test-token ' }, sleepFn: noSleep });

    expect(mockFetch).toHaveBeenCalledWith(
      expect.any(String),
      expect.objectContaining({ headers: expect.objectContaining({ Authorization: 'token test-token' }) }),
    );
  });

  it('exits at INIT without any request when the token is missing', async () => {
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });
    const transitions: HarvestTransition[] = [];

    await expect(
      runHarvest({ config, env: {}, sleepFn: noSleep, onTransition: t => transitions.push(t) }),
    ).rejects.toThrow('exit 1');

    expect(transitions).toEqual([{ state: 'INIT' }]);
    expect(mockFetch).not.toHaveBeenCalled();
    expect(existsSync(join(TEST_DIR, 'users.csv'))).toBe(false);
  });

  it('reports state transitions in order', async () => {
    serveGitHub(['alice', 'ghost'], ['ghost']);
    const transitions: HarvestTransition[] = [];

    await runHarvest({ config, token: 'test-token', sleepFn: noSleep, onTransition: t => transitions.push(t) });

    expect(transitions).toEqual([
      { state: 'INIT' },
      { state: 'TOKEN_LOADED' },
      { state: 'USERS_FETCHED' },
      { state: 'DETAIL_FETCHED', login: 'alice' },
      { state: 'REPOS_FETCHED', login: 'alice' },
      { state: 'SKIPPED', login: 'ghost' },
      { state: 'EXPORTED' },
      { state: 'DONE' },
    ]);
  });

  it('skips search results without a login without requesting anything', async () => {
    mockFetch.mockResolvedValueOnce(json({ items: [{ id: 1 }] }));

    const summary = await runHarvest({ config, token: 'test-token', sleepFn: noSleep });

    expect(summary.skippedLogins).toEqual(['']);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('logs progress every ten users', async () => {
    serveGitHub(Array.from({ length: 10 }, (_, i) => `user${i}`));

    await runHarvest({ config, token: 'test-token', sleepFn: noSleep });

    expect(console.log).toHaveBeenCalledWith('Processed 10 users out of 10.');
  });
});
