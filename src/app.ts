import Fastify from 'fastify';
import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { registerRoutes, type RouteDeps } from './routes/index.js';
import { AuthExchangeError, OAuthStateError } from './shared/errors.js';

export interface AppOptions extends RouteDeps {
  apiAdminToken: string;
  logger?: boolean;
}

const PUBLIC_ROUTES = new Set([
  '/api/health',
  '/api/oauth/gmail/callback',
  '/api/oauth/outlook/callback',
]);

const getRequestPathname = (url: string) => {
  try {
    return new URL(url, 'http://localhost').pathname.replace(/\/+$/, '') || '/';
  } catch {
    return String(url || '/').split('?')[0] || '/';
  }
};

const statusForError = (error: FastifyError) => {
  if (error instanceof OAuthStateError) {
    return 400;
  }
  if (error instanceof AuthExchangeError) {
    return 502;
  }
  return typeof error.statusCode === 'number' ? error.statusCode : 500;
};

export const createApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = Fastify({ logger: options.logger ?? false });

  app.addHook('onRequest', async (request, reply) => {
    if (PUBLIC_ROUTES.has(getRequestPathname(request.url))) {
      return;
    }
    // Without a configured token (development only) the API is open.
    if (!options.apiAdminToken) {
      return;
    }
    const headerValue = request.headers['x-api-key'];
    const headerToken = Array.isArray(headerValue) ? headerValue[0] : headerValue;
    if (headerToken !== options.apiAdminToken) {
      return reply.code(401).send({ error: 'unauthorized' });
    }
  });

  app.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    const status = statusForError(error);
    if (status >= 500) {
      request.log.error(error);
    } else {
      request.log.warn({ err: error }, 'request rejected');
    }
    const message = status >= 400 && status < 500 ? error.message : 'internal server error';
    reply.code(status).send({ error: status === 502 ? 'provider authorization failed' : message });
  });

  await registerRoutes(app, options);
  return app;
};
