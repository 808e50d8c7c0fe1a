import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { PROVIDERS } from '../shared/types.js';
import type { RouteDeps } from './index.js';

const providerParamsSchema = z.object({ provider: z.enum(PROVIDERS) });
const authorizeQuerySchema = z.object({ userId: z.string().uuid() });
const callbackQuerySchema = z.object({
  code: z.string().min(1).optional(),
  state: z.string().min(1).optional(),
  error: z.string().optional(),
});

export const registerOAuthRoutes = async (app: FastifyInstance, deps: RouteDeps) => {
  app.get('/api/oauth/:provider/authorize', async (req, reply) => {
    const params = providerParamsSchema.safeParse(req.params);
    if (!params.success) {
      return reply.code(404).send({ error: 'unknown provider' });
    }
    const query = authorizeQuerySchema.safeParse(req.query);
    if (!query.success) {
      return reply.code(400).send({ error: 'userId is required' });
    }
    const url = await deps.connector.authorizeUrl(params.data.provider, query.data.userId);
    return { url };
  });

  app.get('/api/oauth/:provider/callback', async (req, reply) => {
    const params = providerParamsSchema.safeParse(req.params);
    if (!params.success) {
      return reply.code(404).send({ error: 'unknown provider' });
    }
    const query = callbackQuerySchema.safeParse(req.query);
    if (!query.success || query.data.error) {
      return reply.code(400).send({ error: query.success ? `authorization denied: ${query.data.error}` : 'invalid callback' });
    }
    const { code, state } = query.data;
    if (!code || !state) {
      return reply.code(400).send({ error: 'code and state are required' });
    }
    const provider = params.data.provider;
    await deps.connector.complete(provider, code, state);
    return reply.redirect(`${deps.frontendBaseUrl}/#/dashboard?connected=${provider}`);
  });
};
