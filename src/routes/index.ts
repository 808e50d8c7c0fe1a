import type { FastifyInstance } from 'fastify';
import type { AccountRepository } from '../services/accounts.js';
import type { AccountConnector } from '../services/oauthConnect.js';
import type { SyncScheduler } from '../services/scheduler.js';
import { registerAccountRoutes } from './accounts.js';
import { registerOAuthRoutes } from './oauth.js';

export interface RouteDeps {
  accounts: AccountRepository;
  scheduler: Pick<SyncScheduler, 'trigger'>;
  connector: Pick<AccountConnector, 'authorizeUrl' | 'complete'>;
  frontendBaseUrl: string;
}

export const registerRoutes = async (app: FastifyInstance, deps: RouteDeps) => {
  app.get('/api/health', async () => ({ ok: true }));
  await registerAccountRoutes(app, deps);
  await registerOAuthRoutes(app, deps);
};
