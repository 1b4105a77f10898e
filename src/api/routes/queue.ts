import type { FastifyInstance } from 'fastify';
import type { RouteOpts } from '../types.js';

export async function registerQueueRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  fastify.get<{ Querystring: { limit?: string } }>('/v1/queue', async (req) => {
    const limit = Math.min(Math.max(parseInt(req.query.limit ?? '50', 10) || 50, 1), 200);
    return { messages: opts.queue.list(limit), total: opts.queue.count(), limit };
  });

  fastify.get<{ Params: { id: string } }>('/v1/queue/:id', async (req, reply) => {
    const message = opts.queue.get(req.params.id);
    if (!message) return reply.status(404).send({ error: 'Message not found' });
    return message;
  });
}
