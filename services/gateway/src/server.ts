import Fastify, { type FastifyError } from 'fastify';
import type { LogLevel } from './config';
import type { ResourceStore } from './contracts/resourceStore';
import { hostFromHeader } from './guard/hostGuard';
import type { GatewayState } from './lifecycle/state';
import { HOST_REJECTED_MESSAGE, sendError } from './routes/reply';
import { registerResourceRoutes } from './routes/resources';

export interface AppDeps {
  store: ResourceStore;
  state: GatewayState;
  logLevel?: LogLevel;
  maxConnections?: number;
}

/**
 * Builds the gateway listener. Every route, including the not-found
 * handler, sits behind the host check, which runs before the body is read.
 */
export async function buildApp(deps: AppDeps) {
  const { store, state, logLevel = 'silent' } = deps;
  const app = Fastify({
    logger: logLevel === 'silent' ? false : { level: logLevel },
    // requests on connections still open during drain go through the host check and sendError
    return503OnClosing: false,
  });

  if (deps.maxConnections !== undefined) {
    app.server.maxConnections = deps.maxConnections;
  }

  // --- Host admission ---
  app.addHook('onRequest', async (req, reply) => {
    const host = hostFromHeader(req.headers.host);
    if (!state.guard.authorize(host)) {
      req.log.warn({ host }, 'Rejected request for unlisted host');
      return sendError(reply, 'HostRejected', HOST_REJECTED_MESSAGE);
    }
  });

  app.get('/health', async () => ({
    status: state.phase === 'ready' ? 'ok' : 'unavailable',
    phase: state.phase,
    address: state.publicAddress,
  }));

  // --- Core resource routes ---
  await registerResourceRoutes(app, store);

  app.setNotFoundHandler((req, reply) =>
    sendError(reply, 'InvalidInput', `unknown operation: ${req.method} ${req.url.split('?')[0]}`),
  );

  app.setErrorHandler((err: FastifyError, req, reply) => {
    // malformed JSON, wrong content type, oversized body
    if (err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) {
      return sendError(reply, 'InvalidInput', err.message);
    }
    req.log.error({ err }, 'Request failed');
    return sendError(reply, 'Internal', 'internal error');
  });

  return app;
}

export type GatewayApp = Awaited<ReturnType<typeof buildApp>>;
