import { config } from './config/index.js';
import { initializeDatabase, closeDatabase, getDatabase } from './db/index.js';
import { buildServer } from './app.js';
import { PhotoSyncService } from './services/sync/index.js';
import { StateStore } from '../services/photosync/src/sync/state.js';
import { loadOAuthClient } from '../services/photosync/src/config.js';
import { getPhotosyncConfig } from '../services/photosync/src/adapters/config.js';
import { getLogger } from './log/logger.js';

const logger = getLogger({ component: 'server' });

async function start() {
  try {
    // Initialize database
    const db = getDatabase();
    await initializeDatabase(db);
    logger.info({ path: config.database.path }, 'Database initialized');

    const photosyncConfig = getPhotosyncConfig();
    const service = new PhotoSyncService({
      store: new StateStore(db),
      rootPath: photosyncConfig.rootPath,
      batchSize: photosyncConfig.batchSize,
      windowHeuristic: photosyncConfig.windowHeuristic,
      oauth: () => loadOAuthClient(photosyncConfig),
    });

    const server = await buildServer({ service });

    // Start server
    const address = await server.listen({
      port: config.server.port,
      host: config.server.host,
    });
    logger.info({ address, root: photosyncConfig.rootPath }, 'Server listening');

    // Graceful shutdown
    const shutdown = async (signal: string) => {
      logger.info({ signal }, 'Shutting down gracefully');
      await server.close();
      await closeDatabase();
      process.exit(0);
    };

    process.on('SIGTERM', () => {
      shutdown('SIGTERM').catch((error: unknown) => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      });
    });
    process.on('SIGINT', () => {
      shutdown('SIGINT').catch((error: unknown) => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      });
    });
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

void start();
