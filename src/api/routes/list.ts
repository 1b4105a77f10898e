import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { loadSnapshot } from '../../list/loader.js';
import { validateSnapshot } from '../../list/validate.js';
import { ListParseError } from '../../shared/errors.js';

const ValidateBodySchema = z.object({
  source: z.string(),
  revision: z.string().min(1).default('request'),
});

export async function registerListRoutes(fastify: FastifyInstance) {
  fastify.post('/v1/list/validate', async (req, reply) => {
    const body = ValidateBodySchema.safeParse(req.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'source (YAML text) is required', issues: body.error.issues });
    }

    try {
      const snapshot = loadSnapshot(body.data.source, body.data.revision);
      const violations = validateSnapshot(snapshot);
      return { valid: violations.length === 0, entries: snapshot.entries.length, violations };
    } catch (err) {
      if (err instanceof ListParseError) {
        return reply.status(422).send({ error: err.message, kind: err.kind });
      }
      throw err;
    }
  });
}
