import { env } from './src/config/env.js';
import { createApp } from './src/app.js';
import { createEngine } from './src/engine.js';
import { createLogger } from './src/logger.js';

if (env.nodeEnv === 'production' && !env.apiAdminToken) {
  throw new Error('API_ADMIN_TOKEN is required in production');
}

const logger = createLogger(env.logLevel);
const engine = await createEngine(env, logger);

const server = await createApp({
  accounts: engine.accounts,
  scheduler: engine.scheduler,
  connector: engine.connector,
  frontendBaseUrl: env.frontendBaseUrl,
  apiAdminToken: env.apiAdminToken,
  logger: env.nodeEnv === 'development',
});

const stop = async (signal: NodeJS.Signals) => {
  logger.info({ signal }, 'shutting down API server');
  await server.close();
  await engine.close();
  process.exit(0);
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    stop(signal).catch((error: unknown) => {
      logger.error({ err: error }, 'API server shutdown failed');
      process.exit(1);
    });
  });
}

await server.listen({ port: env.port, host: '0.0.0.0' });
logger.info({ port: env.port }, 'mail sync API listening');
