import type { FastifyInstance } from 'fastify';
import { API_VERSION } from '../types.js';
import type { RouteOpts } from '../types.js';

export async function registerHealthRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  fastify.get('/v1/health', async () => ({
    status: 'ok',
    version: API_VERSION,
    github_token: opts.config.github.token !== undefined,
    summarizer: opts.config.llm.api_key !== undefined,
  }));
}
