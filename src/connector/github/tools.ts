/**
 * GitHub connector: README lookup through the REST contents API.
 *
 * Responses are validated with zod at this boundary; nothing past this file
 * sees untyped GitHub JSON.
 */
import { GitHubApiError } from '../../shared/errors.js';
import { logger } from '../../shared/logger.js';
import {
  GitHubDirectoryListingSchema,
  GitHubErrorBodySchema,
  GitHubFileSchema,
} from '../../shared/schemas.js';
import type { ReadmeSource } from '../../runtime/collaborators.js';
import type { ReadmeFetchResult } from '../../runtime/types.js';

export const GITHUB_API = 'https://api.github.com';

export type FetchLike = (url: string | URL, init?: RequestInit) => Promise<Response>;

export interface GitHubToolContext {
  token?: string;
  fetch: FetchLike;
  apiBase?: string;
  userAgent?: string;
}

export interface RepoRef {
  owner: string;
  repo: string;
  /** Input url without query string or fragment. */
  cleanUrl: string;
  gist: boolean;
}

/**
 * Split a github.com url into owner and repo. Query strings such as
 * `?tab=readme-ov-file` and fragments are dropped first.
 */
export function parseRepoUrl(url: string): RepoRef {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new Error(`Invalid repository URL: ${url}`);
  }
  parsed.search = '';
  parsed.hash = '';
  const cleanUrl = parsed.toString();

  const [owner, rawRepo] = parsed.pathname.split('/').filter((part) => part.length > 0);
  if (parsed.host === 'gist.github.com') {
    return { owner: owner ?? '', repo: rawRepo ?? '', cleanUrl, gist: true };
  }
  if (parsed.host !== 'github.com' || !owner || !rawRepo) {
    throw new Error(`Not a GitHub repository URL (expected https://github.com/<owner>/<repo>): ${url}`);
  }
  return { owner, repo: rawRepo.replace(/\.git$/, ''), cleanUrl, gist: false };
}

export function isReadmeName(name: string): boolean {
  const lower = name.toLowerCase();
  return lower === 'readme' || lower.startsWith('readme.');
}

function headers(ctx: GitHubToolContext): Record<string, string> {
  const h: Record<string, string> = {
    Accept: 'application/vnd.github+json',
    'X-GitHub-Api-Version': '2022-11-28',
    'User-Agent': ctx.userAgent ?? 'repolist-curator',
  };
  if (ctx.token) h['Authorization'] = `Bearer ${ctx.token}`;
  return h;
}

async function errorDetail(resp: Response): Promise<string> {
  const text = await resp.text();
  try {
    const body = GitHubErrorBodySchema.safeParse(JSON.parse(text));
    if (body.success) return body.data.message;
  } catch {
    // not JSON; fall through to the raw text
  }
  return text.slice(0, 200);
}

/** 404 messages that mean "there is nothing to summarize" rather than an error. */
function missingReason(detail: string): string {
  if (/repository is empty/i.test(detail)) return 'Repository is empty';
  if (/no commit found/i.test(detail)) return 'Repository has no commits on its default branch';
  return 'Repository not found or not accessible';
}

export async function fetchReadme(ctx: GitHubToolContext, url: string): Promise<ReadmeFetchResult> {
  const ref = parseRepoUrl(url);
  if (ref.gist) {
    logger.info('Skipping gist', { url: ref.cleanUrl });
    return { found: false, repo_url: ref.cleanUrl, reason: 'GitHub Gists are not supported' };
  }

  const apiBase = ctx.apiBase ?? GITHUB_API;
  const repoPath = `${encodeURIComponent(ref.owner)}/${encodeURIComponent(ref.repo)}`;

  // Root listing of the default branch (no ref parameter)
  const listResp = await ctx.fetch(`${apiBase}/repos/${repoPath}/contents`, { headers: headers(ctx) });
  if (!listResp.ok) {
    const detail = await errorDetail(listResp);
    if (listResp.status === 404) {
      return { found: false, repo_url: ref.cleanUrl, reason: missingReason(detail) };
    }
    throw new GitHubApiError(listResp.status, detail);
  }

  const listing = GitHubDirectoryListingSchema.parse(await listResp.json());
  const candidates = listing.filter((e) => e.type === 'file' && isReadmeName(e.name));
  const readme =
    candidates.find((e) => e.name.toLowerCase() === 'readme.md') ?? candidates[0];
  if (!readme) {
    logger.info('No README at repository root', { url: ref.cleanUrl, entries: listing.length });
    return { found: false, repo_url: ref.cleanUrl, reason: 'No README file found at the repository root' };
  }

  const fileResp = await ctx.fetch(
    `${apiBase}/repos/${repoPath}/contents/${encodeURIComponent(readme.path)}`,
    { headers: headers(ctx) },
  );
  if (!fileResp.ok) {
    throw new GitHubApiError(fileResp.status, await errorDetail(fileResp));
  }

  const file = GitHubFileSchema.parse(await fileResp.json());
  if (file.encoding !== 'base64') {
    throw new Error(`Unsupported README encoding: ${file.encoding}`);
  }
  const content = Buffer.from(file.content.replace(/\s/g, ''), 'base64').toString('utf8');

  logger.info('Fetched README', { url: ref.cleanUrl, name: file.name, size: file.size });

  return {
    found: true,
    owner: ref.owner,
    repo: ref.repo,
    repo_url: ref.cleanUrl,
    name: file.name,
    sha: file.sha,
    size: file.size,
    download_url: file.download_url,
    content,
  };
}

export class GitHubReadmeSource implements ReadmeSource {
  constructor(private readonly ctx: GitHubToolContext) {}

  fetchReadme(url: string): Promise<ReadmeFetchResult> {
    return fetchReadme(this.ctx, url);
  }
}
