import type { FastifyReply } from 'fastify';
import type { ZodError } from 'zod';
import { HTTP_STATUS, type ErrorKind, type StoreError } from '../errors';

export interface WireError {
  error: {
    kind: ErrorKind;
    message: string;
    current_version?: number;
  };
}

export const HOST_REJECTED_MESSAGE = 'host not allowed';

/** The only place an outcome becomes an error response. */
export function sendError(reply: FastifyReply, kind: ErrorKind, message: string, currentVersion?: number) {
  const body: WireError = {
    error: { kind, message, ...(currentVersion !== undefined ? { current_version: currentVersion } : {}) },
  };
  return reply.code(HTTP_STATUS[kind]).send(body);
}

export function sendStoreError(reply: FastifyReply, error: StoreError) {
  return sendError(reply, error.kind, error.message, error.currentVersion);
}

export function badRequest(reply: FastifyReply, error: ZodError) {
  const message = error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  return sendError(reply, 'InvalidInput', message);
}
