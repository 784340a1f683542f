import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { RoutesOptions } from './index.js';
import { sendError } from './errors.js';
import { serializeItem, serializeMetadata, serializeTransaction } from './serialize.js';

interface ItemParams {
  id: string;
}

const listQuerySchema = z.object({
  status: z.enum(['Pending', 'Downloaded']).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

export async function itemsRoutes(fastify: FastifyInstance, options: RoutesOptions) {
  const { service } = options;

  // GET /api/items - List known items, oldest first
  fastify.get('/items', async (request, reply) => {
    const query = listQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.code(400).send({
        error: 'Invalid query',
        message: query.error.issues.map((issue) => issue.message).join('; '),
      });
    }

    const items = await service.listItems(query.data);
    return {
      items: items.map(serializeItem),
      limit: query.data.limit,
      offset: query.data.offset,
    };
  });

  // GET /api/items/:id - One item with its transaction history
  fastify.get<{ Params: ItemParams }>('/items/:id', async (request, reply) => {
    const found = await service.getItem(request.params.id);
    if (!found) {
      return reply.code(404).send({ error: 'Item not found' });
    }

    return {
      item: serializeItem(found.item),
      transactions: found.transactions.map(serializeTransaction),
    };
  });

  // GET /api/items/:id/remote - Current metadata from Google Photos
  fastify.get<{ Params: ItemParams }>('/items/:id/remote', async (request, reply) => {
    try {
      return serializeMetadata(await service.remoteItem(request.params.id));
    } catch (error) {
      return sendError(reply, 'Remote lookup failed', error);
    }
  });
}
