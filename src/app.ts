import Fastify from 'fastify';
import cors from '@fastify/cors';
import { config } from './config/index.js';
import type { LogLevel } from './config/index.js';
import { registerRoutes } from './api/index.js';
import type { PhotoSyncService } from './services/sync/index.js';

export interface BuildServerOptions {
  service: PhotoSyncService;
  logLevel?: LogLevel;
}

export async function buildServer(options: BuildServerOptions) {
  const level = options.logLevel ?? config.log.level;

  const server = Fastify({
    logger: {
      level,
      transport: config.log.pretty && level !== 'silent' ? { target: 'pino-pretty' } : undefined,
    },
  });

  // Register CORS
  await server.register(cors, {
    origin: true,
  });

  // Register routes
  await registerRoutes(server, { service: options.service });

  return server;
}
