import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { QueryService } from '../services/query/query.service.js';
import { errorMessage } from '../utils/errors.js';

const QueryRequestSchema = z.object({
  question: z.string().trim().min(1),
});

export interface QueryRoutesOptions {
  queryService: Pick<QueryService, 'process'>;
}

export async function queryRoutes(fastify: FastifyInstance, { queryService }: QueryRoutesOptions) {
  // Translate a question to SQL, run it and return the formatted result
  fastify.post('/query', async (request, reply) => {
    try {
      const { question } = QueryRequestSchema.parse(request.body);

      const response = await queryService.process(question);

      return reply.send(response);
    } catch (error) {
      if (error instanceof z.ZodError) {
        return reply.code(400).send({ error: 'Invalid request', details: error.errors });
      }

      fastify.log.error({ err: error }, 'Failed to process query');
      return reply.code(500).send({ error: `Internal server error: ${errorMessage(error)}`, statusCode: 500 });
    }
  });
}
