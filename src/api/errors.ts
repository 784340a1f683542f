import type { FastifyReply } from 'fastify';
import {
  AuthError,
  SyncInProgressError,
  errorMessage,
} from '../../services/photosync/src/errors.js';

export function statusCodeFor(error: unknown): number {
  if (error instanceof SyncInProgressError) {
    return 409;
  }
  if (error instanceof AuthError) {
    return 401;
  }
  return 500;
}

export function sendError(reply: FastifyReply, label: string, error: unknown) {
  const statusCode = statusCodeFor(error);
  if (statusCode === 500) {
    reply.log.error({ err: error }, label);
  }
  return reply.code(statusCode).send({
    error: label,
    message: errorMessage(error),
  });
}
