import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { toAccountState } from '../shared/types.js';
import type { RouteDeps } from './index.js';

const accountParamsSchema = z.object({ accountId: z.string().uuid() });
const listQuerySchema = z.object({ userId: z.string().uuid() });

export const registerAccountRoutes = async (app: FastifyInstance, deps: RouteDeps) => {
  app.get('/api/accounts', async (req, reply) => {
    const parsed = listQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: 'userId is required' });
    }
    const accounts = await deps.accounts.listAccountsForUser(parsed.data.userId);
    return { accounts: accounts.map(toAccountState) };
  });

  app.get('/api/accounts/:accountId', async (req, reply) => {
    const parsed = accountParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      return reply.code(400).send({ error: 'invalid account id' });
    }
    const account = await deps.accounts.getAccount(parsed.data.accountId);
    if (!account) {
      return reply.code(404).send({ error: 'account not found' });
    }
    return { account: toAccountState(account) };
  });

  app.post('/api/accounts/:accountId/sync', async (req, reply) => {
    const parsed = accountParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      return reply.code(400).send({ error: 'invalid account id' });
    }
    const account = await deps.accounts.getAccount(parsed.data.accountId);
    if (!account) {
      return reply.code(404).send({ error: 'account not found' });
    }
    if (!account.active) {
      return reply.code(409).send({ error: 'account requires re-authorization' });
    }
    await deps.scheduler.trigger(account.id);
    return reply.code(202).send({ queued: true, accountId: account.id });
  });

  app.delete('/api/accounts/:accountId', async (req, reply) => {
    const parsed = accountParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      return reply.code(400).send({ error: 'invalid account id' });
    }
    const deleted = await deps.accounts.deleteAccount(parsed.data.accountId);
    if (!deleted) {
      return reply.code(404).send({ error: 'account not found' });
    }
    return reply.code(204).send();
  });
};
