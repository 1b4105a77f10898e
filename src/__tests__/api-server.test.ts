import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import type Database from 'better-sqlite3';
import type { FastifyInstance } from 'fastify';
import { createServer } from '../api/server.js';
import { SqliteMessageQueue } from '../runtime/queue.js';
import { AppConfigSchema } from '../shared/schemas.js';
import { createFakeCollaborators, createTestDb, foundReadme, listYaml, repo } from './test-helpers.js';
import type { FakeCollaborators } from './test-helpers.js';

describe('API server', () => {
  let db: Database.Database;
  let fakes: FakeCollaborators;
  let fastify: FastifyInstance;

  beforeEach(async () => {
    db = createTestDb();
    fakes = createFakeCollaborators(foundReadme('o', 'r', 'Fast port scanner'));
    ({ fastify } = await createServer({
      config: AppConfigSchema.parse({}),
      db,
      collaborators: { ...fakes, queue: new SqliteMessageQueue(db) },
    }));
  });

  afterEach(async () => {
    await fastify.close();
    db.close();
  });

  it('reports health', async () => {
    const res = await fastify.inject({ method: 'GET', url: '/v1/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok', version: '0.1.0', github_token: false, summarizer: false });
    expect(res.headers['x-content-type-options']).toBe('nosniff');
  });

  describe('POST /v1/list/validate', () => {
    it('validates a list document', async () => {
      const res = await fastify.inject({
        method: 'POST',
        url: '/v1/list/validate',
        payload: { source: listYaml([repo('o/a'), repo('o/a')]) },
      });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        valid: false,
        entries: 2,
        violations: [{ index: 1, url: 'https://github.com/o/a', message: 'Duplicate url (first listed at entry 1)' }],
      });
    });

    it('returns 422 for unparseable YAML', async () => {
      const res = await fastify.inject({ method: 'POST', url: '/v1/list/validate', payload: { source: 'repos: [' } });
      expect(res.statusCode).toBe(422);
      expect(res.json()).toMatchObject({ kind: 'invalid_yaml' });
    });

    it('returns 400 without a source', async () => {
      const res = await fastify.inject({ method: 'POST', url: '/v1/list/validate', payload: {} });
      expect(res.statusCode).toBe(400);
    });
  });

  describe('enrichments', () => {
    it('runs the pipeline and exposes the run', async () => {
      const created = await fastify.inject({
        method: 'POST',
        url: '/v1/enrichments',
        payload: { url: 'https://github.com/o/r', priority: 'high' },
      });
      expect(created.statusCode).toBe(201);
      const body: { id: string; status: string } = created.json();
      expect(body.status).toBe('success');

      const fetched = await fastify.inject({ method: 'GET', url: `/v1/enrichments/${body.id}` });
      expect(fetched.statusCode).toBe(200);
      expect(fetched.json()).toMatchObject({ id: body.id, status: 'success', params: { priority: 'high' } });

      const listed = await fastify.inject({ method: 'GET', url: '/v1/enrichments?status=success' });
      expect(listed.json()).toMatchObject({ runs: [{ id: body.id }], limit: 50 });

      const queue = await fastify.inject({ method: 'GET', url: '/v1/queue' });
      expect(queue.json()).toMatchObject({
        total: 1,
        messages: [{ priority: 'high', payload: { url: 'https://github.com/o/r' } }],
      });
    });

    it('rejects invalid input with 400', async () => {
      const res = await fastify.inject({
        method: 'POST',
        url: '/v1/enrichments',
        payload: { url: 'https://github.com/o/r', max_summary_length: 5000 },
      });
      expect(res.statusCode).toBe(400);
      expect(fakes.calls).toEqual([]);
    });

    it('rejects an unknown status filter', async () => {
      const res = await fastify.inject({ method: 'GET', url: '/v1/enrichments?status=done' });
      expect(res.statusCode).toBe(400);
    });

    it('returns 404 for an unknown run', async () => {
      const res = await fastify.inject({ method: 'GET', url: '/v1/enrichments/run_missing' });
      expect(res.statusCode).toBe(404);
      const retry = await fastify.inject({ method: 'POST', url: '/v1/enrichments/run_missing/retry' });
      expect(retry.statusCode).toBe(404);
    });

    it('retries a failed run and refuses to retry a successful one', async () => {
      fakes.summarizer.failWith = new Error('model timeout');
      const created = await fastify.inject({ method: 'POST', url: '/v1/enrichments', payload: { url: 'https://github.com/o/r' } });
      const body: { id: string; status: string } = created.json();
      expect(body.status).toBe('failed');

      fakes.summarizer.failWith = null;
      const retried = await fastify.inject({ method: 'POST', url: `/v1/enrichments/${body.id}/retry` });
      expect(retried.statusCode).toBe(200);
      expect(retried.json()).toMatchObject({ id: body.id, status: 'success', attempts: 2 });

      const again = await fastify.inject({ method: 'POST', url: `/v1/enrichments/${body.id}/retry` });
      expect(again.statusCode).toBe(409);
    });
  });
});
