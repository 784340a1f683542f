import path from 'path';
import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const configSchema = z.object({
  server: z.object({
    port: z.number().int().positive().default(8080),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  }),
  database: z.object({
    path: z.string().min(1),
  }),
  photos: z.object({
    rootPath: z.string().min(1),
  }),
  google: z.object({
    clientId: z.string(),
    clientSecret: z.string(),
    redirectUri: z.string().url(),
    clientSecretFile: z.string(),
  }),
  sync: z.object({
    batchSize: z.number().int().positive().default(16),
    windowHeuristic: z.boolean().default(true),
  }),
  log: z.object({
    level: logLevelSchema.default('info'),
    pretty: z.boolean().default(false),
  }),
});

type Config = z.infer<typeof configSchema>;
type LogLevel = z.infer<typeof logLevelSchema>;

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rootPath = env.PHOTOS_ROOT_PATH || './photos';

  const rawConfig = {
    server: {
      port: parseInt(env.PORT || '8080', 10),
      host: env.HOST || '0.0.0.0',
      nodeEnv: env.NODE_ENV || 'development',
    },
    database: {
      path: env.SYNC_DB_PATH || path.join(rootPath, 'sync.db'),
    },
    photos: {
      rootPath,
    },
    google: {
      clientId: env.GOOGLE_CLIENT_ID || '',
      clientSecret: env.GOOGLE_CLIENT_SECRET || '',
      redirectUri: env.GOOGLE_REDIRECT_URI || 'http://localhost:8080/api/auth/google/callback',
      clientSecretFile: env.GOOGLE_CLIENT_SECRET_FILE || 'clientsecret.json',
    },
    sync: {
      batchSize: parseInt(env.SYNC_BATCH_SIZE || '16', 10),
      windowHeuristic: parseBoolean(env.SYNC_WINDOW_HEURISTIC, true),
    },
    log: {
      level: env.LOG_LEVEL || 'info',
      pretty: parseBoolean(env.LOG_PRETTY, false),
    },
  };

  return configSchema.parse(rawConfig);
}

export const config = loadConfig();
export type { Config, LogLevel };
