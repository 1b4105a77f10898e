/**
 * Wires the production collaborators from validated configuration.
 *
 * The GitHub token is optional (unauthenticated calls work at a lower rate
 * limit). Without an LLM key the summarizer handle is present but fails its
 * step with CollaboratorUnavailableError.
 */
import type Database from 'better-sqlite3';
import { GitHubReadmeSource } from '../../connector/github/tools.js';
import type { FetchLike } from '../../connector/github/tools.js';
import { unavailableSummarizer } from '../collaborators.js';
import type { Collaborators } from '../collaborators.js';
import { SqliteMessageQueue } from '../queue.js';
import type { AppConfig, RepolistPaths } from '../../workspace/types.js';
import { FilesystemObjectStorage } from './object-store.js';
import { ChatSummarizer } from './summarize.js';

export interface CollaboratorDeps {
  db: Database.Database;
  paths: RepolistPaths;
  fetch?: FetchLike;
}

export function createCollaborators(config: AppConfig, deps: CollaboratorDeps): Collaborators {
  const fetchImpl: FetchLike = deps.fetch ?? ((url, init) => fetch(url, init));

  const readmes = new GitHubReadmeSource({
    token: config.github.token,
    apiBase: config.github.api_base,
    userAgent: config.github.user_agent,
    fetch: fetchImpl,
  });

  const storage = new FilesystemObjectStorage(config.storage.dir ?? deps.paths.objectsDir);

  const apiKey = config.llm.api_key;
  const summarizer = apiKey
    ? new ChatSummarizer({
        apiKey,
        apiBase: config.llm.api_base,
        model: config.llm.model,
        temperature: config.llm.temperature,
        fetch: fetchImpl,
      })
    : unavailableSummarizer('no LLM API key configured (set LLM_API_KEY or OPENAI_API_KEY)');

  return { readmes, storage, summarizer, queue: new SqliteMessageQueue(deps.db) };
}
