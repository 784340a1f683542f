import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { RoutesOptions } from './index.js';
import { sendError } from './errors.js';

const syncBodySchema = z
  .object({
    all: z.boolean().optional(),
    from: z.coerce.date().optional(),
    to: z.coerce.date().optional(),
  })
  .default({});

const resyncBodySchema = z
  .object({
    download: z.boolean().optional(),
  })
  .default({});

export async function syncRoutes(fastify: FastifyInstance, options: RoutesOptions) {
  const { service } = options;

  // POST /api/sync - Fetch metadata and download pending items
  fastify.post('/sync', async (request, reply) => {
    const body = syncBodySchema.safeParse(request.body ?? {});
    if (!body.success) {
      return reply.code(400).send({
        error: 'Invalid request body',
        message: body.error.issues.map((issue) => issue.message).join('; '),
      });
    }

    try {
      const result = await service.sync(body.data);
      return {
        success: result.metadata.success && result.download !== null && result.download.failed.length === 0,
        metadata: {
          items_seen: result.metadata.itemsSeen,
          items_added: result.metadata.itemsAdded,
          items_skipped: result.metadata.itemsSkipped,
          failed_windows: result.metadata.failedWindows.length,
        },
        download: result.download,
      };
    } catch (error) {
      return sendError(reply, 'Sync failed', error);
    }
  });

  // POST /api/sync/resync - Mark vanished local files as pending
  fastify.post('/sync/resync', async (request, reply) => {
    const body = resyncBodySchema.safeParse(request.body ?? {});
    if (!body.success) {
      return reply.code(400).send({
        error: 'Invalid request body',
        message: body.error.issues.map((issue) => issue.message).join('; '),
      });
    }

    try {
      const outcome = await service.resync(body.data);
      return { success: outcome.failed.length === 0, ...outcome };
    } catch (error) {
      return sendError(reply, 'Resync failed', error);
    }
  });

  // GET /api/sync/status - Item counts and the last run
  fastify.get('/sync/status', async () => {
    return service.status();
  });
}
