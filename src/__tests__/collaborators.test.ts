import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import type Database from 'better-sqlite3';
import { GitHubReadmeSource } from '../connector/github/tools.js';
import { SqliteMessageQueue } from '../runtime/queue.js';
import { createCollaborators } from '../runtime/tools/index.js';
import { FilesystemObjectStorage } from '../runtime/tools/object-store.js';
import { ChatSummarizer } from '../runtime/tools/summarize.js';
import { CollaboratorUnavailableError } from '../shared/errors.js';
import { AppConfigSchema } from '../shared/schemas.js';
import { getRepolistPaths } from '../workspace/paths.js';
import { createTestDb, createTempWorkspace, fakeFetch } from './test-helpers.js';
import type { TempWorkspace } from './test-helpers.js';

describe('createCollaborators', () => {
  let db: Database.Database;
  let ws: TempWorkspace;

  beforeEach(() => {
    db = createTestDb();
    ws = createTempWorkspace();
  });

  afterEach(() => {
    db.close();
    ws.cleanup();
  });

  it('wires the production implementations', () => {
    const config = AppConfigSchema.parse({ llm: { api_key: 'test-secret' } });
    const c = createCollaborators(config, { db, paths: getRepolistPaths(ws.workspaceDir) });
    expect(c.readmes).toBeInstanceOf(GitHubReadmeSource);
    expect(c.storage).toBeInstanceOf(FilesystemObjectStorage);
    expect(c.summarizer).toBeInstanceOf(ChatSummarizer);
    expect(c.queue).toBeInstanceOf(SqliteMessageQueue);
  });

  it('uses a summarizer that fails its step when no LLM key is configured', async () => {
    const c = createCollaborators(AppConfigSchema.parse({}), { db, paths: getRepolistPaths(ws.workspaceDir) });
    await expect(c.summarizer.summarize({ content: 'text', maxWords: 20, language: 'en' })).rejects.toThrow(
      CollaboratorUnavailableError,
    );
  });

  it('sends GitHub requests through the injected fetch with the configured token', async () => {
    const { fetch, requests } = fakeFetch([]);
    const config = AppConfigSchema.parse({ github: { token: 'test-secret', api_base: 'https://ghe.example.test/api' } });
    const c = createCollaborators(config, { db, paths: getRepolistPaths(ws.workspaceDir), fetch });
    await c.readmes.fetchReadme('https://github.com/o/r');
    expect(requests[0]?.url).toBe('https://ghe.example.test/api/repos/o/r/contents');
    expect(new Headers(requests[0]?.init?.headers).get('Authorization')).toBe('Bearer test-secret');
  });
});
