import type { FastifyInstance } from 'fastify';
import { resumeRun, retryRun, startEnrichment } from '../../runtime/runner.js';
import { runStatus } from '../../runtime/types.js';
import type { PipelineRun, RunStatus } from '../../runtime/types.js';
import { RunStateError } from '../../shared/errors.js';
import { EnrichmentParamsSchema } from '../../shared/schemas.js';
import type { RouteOpts } from '../types.js';

const STATUSES: readonly RunStatus[] = ['active', 'success', 'skipped', 'failed'];

function runView(run: PipelineRun) {
  return { ...run, status: runStatus(run) };
}

export async function registerEnrichmentRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  fastify.get<{ Querystring: { status?: string; limit?: string } }>('/v1/enrichments', async (req, reply) => {
    const status = STATUSES.find((s) => s === req.query.status);
    if (req.query.status !== undefined && !status) {
      return reply.status(400).send({ error: `status must be one of ${STATUSES.join(', ')}` });
    }
    const limit = Math.min(Math.max(parseInt(req.query.limit ?? '50', 10) || 50, 1), 200);
    const runs = opts.runner.store.list({ status, limit });
    return { runs: runs.map(runView), limit };
  });

  fastify.get<{ Params: { id: string } }>('/v1/enrichments/:id', async (req, reply) => {
    const run = opts.runner.store.get(req.params.id);
    if (!run) return reply.status(404).send({ error: 'Run not found' });
    return runView(run);
  });

  fastify.post(
    '/v1/enrichments',
    { config: { rateLimit: { max: 10, timeWindow: '1 minute' } } },
    async (req, reply) => {
      const params = EnrichmentParamsSchema.safeParse(req.body);
      if (!params.success) {
        return reply.status(400).send({ error: 'Invalid enrichment request', issues: params.error.issues });
      }
      const run = await startEnrichment(params.data, opts.runner);
      return reply.status(201).send(runView(run));
    },
  );

  fastify.post<{ Params: { id: string } }>('/v1/enrichments/:id/retry', async (req, reply) => {
    if (!opts.runner.store.get(req.params.id)) {
      return reply.status(404).send({ error: 'Run not found' });
    }
    try {
      return runView(await retryRun(req.params.id, opts.runner));
    } catch (err) {
      if (err instanceof RunStateError) return reply.status(409).send({ error: err.message });
      throw err;
    }
  });

  fastify.post<{ Params: { id: string } }>('/v1/enrichments/:id/resume', async (req, reply) => {
    if (!opts.runner.store.get(req.params.id)) {
      return reply.status(404).send({ error: 'Run not found' });
    }
    try {
      return runView(await resumeRun(req.params.id, opts.runner));
    } catch (err) {
      if (err instanceof RunStateError) return reply.status(409).send({ error: err.message });
      throw err;
    }
  });
}
