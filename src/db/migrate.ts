import { config } from '../config/index.js';
import { initializeDatabase, closeDatabase } from './index.js';

async function migrate() {
  try {
    console.log(`Initializing database schema at ${config.database.path}...`);
    await initializeDatabase();
    console.log('Database schema initialized successfully!');
  } catch (error) {
    console.error('Migration failed:', error);
    process.exitCode = 1;
  } finally {
    await closeDatabase();
  }
}

void migrate();
