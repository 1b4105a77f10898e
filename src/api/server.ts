import Fastify from 'fastify';
import rateLimit from '@fastify/rate-limit';
import type Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import type { FetchLike } from '../connector/github/tools.js';
import type { Collaborators } from '../runtime/collaborators.js';
import { SqliteMessageQueue } from '../runtime/queue.js';
import { SqliteRunStore } from '../runtime/run-store.js';
import { createCollaborators } from '../runtime/tools/index.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { loadAppConfig } from '../workspace/config.js';
import { openDb } from '../workspace/db.js';
import { getRepolistPaths } from '../workspace/paths.js';
import type { AppConfig } from '../workspace/types.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerListRoutes } from './routes/list.js';
import { registerEnrichmentRoutes } from './routes/enrichments.js';
import { registerQueueRoutes } from './routes/queue.js';

export interface ServerOptions {
  host?: string;
  port?: number;
  cwd?: string;
  /** Injected in tests; defaults come from the workspace. */
  config?: AppConfig;
  db?: Database.Database;
  collaborators?: Collaborators;
  fetch?: FetchLike;
}

export async function createServer(opts: ServerOptions = {}) {
  const paths = getRepolistPaths(opts.cwd);
  const config = opts.config ?? loadAppConfig(paths.config);
  const host = opts.host ?? config.api.host;
  const port = opts.port ?? config.api.port;

  // Enforce loopback bind by default
  const isLoopback = host === '127.0.0.1' || host === 'localhost' || host === '::1';
  if (!isLoopback) {
    logger.warn('Non-loopback bind requested. The API has no authentication.', { host });
  }

  let db = opts.db;
  if (!db) {
    mkdirSync(paths.root, { recursive: true });
    db = openDb(paths.stateDb);
  }
  const queue = new SqliteMessageQueue(db);
  const collaborators =
    opts.collaborators ?? createCollaborators(config, { db, paths, fetch: opts.fetch });

  const fastify = Fastify({
    logger: false,
    trustProxy: false,
  });

  await fastify.register(rateLimit, {
    global: false,
    max: 100,
    timeWindow: '1 minute',
  });

  fastify.addHook('onSend', async (_req, reply) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
  });

  fastify.setErrorHandler(async (err, req, reply) => {
    logger.error('Request failed', { method: req.method, url: req.url, error: errorMessage(err) });
    const status = err.statusCode !== undefined && err.statusCode >= 400 ? err.statusCode : 500;
    return reply.status(status).send({ error: err.message });
  });

  const routeOpts = {
    config,
    queue,
    runner: { store: new SqliteRunStore(db), collaborators },
  };
  await registerHealthRoutes(fastify, routeOpts);
  await registerListRoutes(fastify);
  await registerEnrichmentRoutes(fastify, routeOpts);
  await registerQueueRoutes(fastify, routeOpts);

  return { fastify, host, port };
}

export async function startServer(opts: ServerOptions = {}): Promise<void> {
  const { fastify, host, port } = await createServer(opts);

  try {
    await fastify.listen({ host, port });
    logger.info('repolist API server listening', { host, port, url: `http://${host}:${port}/v1` });
  } catch (err) {
    logger.error('Failed to start server', { error: errorMessage(err) });
    process.exit(1);
  }
}
