import { FastifyInstance } from 'fastify';
import type { PhotoSyncService } from '../services/sync/index.js';
import { itemsRoutes } from './items.js';
import { syncRoutes } from './sync.js';
import { authRoutes } from './auth.js';

export interface RoutesOptions {
  service: PhotoSyncService;
}

export async function registerRoutes(fastify: FastifyInstance, options: RoutesOptions) {
  // Health check
  fastify.get('/api/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // Register all route modules
  await fastify.register(itemsRoutes, { prefix: '/api', ...options });
  await fastify.register(syncRoutes, { prefix: '/api', ...options });
  await fastify.register(authRoutes, { prefix: '/api', ...options });
}
