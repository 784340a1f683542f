import { FastifyInstance } from 'fastify';
import { generateOAuthState } from '../../services/photosync/src/photos/auth.js';
import type { RoutesOptions } from './index.js';
import { sendError } from './errors.js';

interface GoogleCallbackQuery {
  code?: string;
  state?: string;
  error?: string;
}

const STATE_TTL_MS = 10 * 60 * 1000;

export async function authRoutes(fastify: FastifyInstance, options: RoutesOptions) {
  const { service } = options;
  // Pending OAuth states, kept in memory for this process only
  const oauthStates = new Map<string, { createdAt: number }>();

  function pruneStates() {
    const now = Date.now();
    for (const [state, data] of oauthStates.entries()) {
      if (now - data.createdAt > STATE_TTL_MS) {
        oauthStates.delete(state);
      }
    }
  }

  // GET /api/auth/google - Initiate OAuth flow
  fastify.get('/auth/google', async (request, reply) => {
    pruneStates();
    const state = generateOAuthState();

    try {
      const authUrl = service.authorizationUrl(state);
      oauthStates.set(state, { createdAt: Date.now() });
      return { auth_url: authUrl, state };
    } catch (error) {
      return sendError(reply, 'Authorization unavailable', error);
    }
  });

  // GET /api/auth/google/callback - Handle OAuth callback
  fastify.get<{ Querystring: GoogleCallbackQuery }>(
    '/auth/google/callback',
    async (request, reply) => {
      const { code, state, error } = request.query;

      pruneStates();
      if (!state || !oauthStates.has(state)) {
        return reply.code(400).send({ error: 'Invalid state parameter' });
      }
      oauthStates.delete(state);

      if (error || !code) {
        return reply.code(400).send({
          error: 'Authorization denied',
          message: error ?? 'No authorization code returned',
        });
      }

      try {
        await service.authorize(code);
        return {
          success: true,
          message: 'Google Photos authorization successful',
        };
      } catch (err) {
        return sendError(reply, 'Authentication failed', err);
      }
    }
  );
}
