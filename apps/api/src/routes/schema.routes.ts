import type { FastifyInstance } from 'fastify';
import type { SchemaResponse } from '@text2sql/shared-types';

export interface SchemaRoutesOptions {
  schemaContext: string;
}

export async function schemaRoutes(fastify: FastifyInstance, { schemaContext }: SchemaRoutesOptions) {
  // Static schema description, the same text the model sees
  fastify.get('/schema', async (_request, reply) => {
    const body: SchemaResponse = { schema: schemaContext };
    return reply.send(body);
  });
}
