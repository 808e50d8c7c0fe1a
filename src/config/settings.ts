export type EnvSource = Record<string, string | undefined>;

const required = (value?: string, name = 'environment variable'): string => {
  if (!value) {
    throw new Error(`Missing required ${name}`);
  }
  return value;
};

const positiveNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return value !== undefined && value !== '' && Number.isFinite(parsed) && parsed > 0
    ? Math.floor(parsed)
    : fallback;
};

const trimTrailingSlash = (value: string) => value.replace(/\/+$/, '');

export const readSettings = (source: EnvSource) => {
  const appBaseUrl = trimTrailingSlash(source.APP_BASE_URL || 'http://localhost:3000');
  return {
    nodeEnv: source.NODE_ENV ?? 'development',
    port: positiveNumber(source.PORT, 3000),
    logLevel: source.LOG_LEVEL || 'info',
    databaseUrl: required(source.DATABASE_URL, 'DATABASE_URL'),
    apiAdminToken: source.API_ADMIN_TOKEN ?? '',
    appBaseUrl,
    frontendBaseUrl: trimTrailingSlash(source.FRONTEND_BASE_URL || appBaseUrl),
    credentialEncryptionKey: required(source.CREDENTIAL_ENCRYPTION_KEY, 'CREDENTIAL_ENCRYPTION_KEY'),
    google: {
      clientId: source.GOOGLE_CLIENT_ID ?? '',
      clientSecret: source.GOOGLE_CLIENT_SECRET ?? '',
      redirectUri: source.GOOGLE_REDIRECT_URI || `${appBaseUrl}/api/oauth/gmail/callback`,
    },
    microsoft: {
      clientId: source.MS_CLIENT_ID ?? '',
      clientSecret: source.MS_CLIENT_SECRET ?? '',
      tenant: source.MS_TENANT || 'common',
      redirectUri: source.MS_REDIRECT_URI || `${appBaseUrl}/api/oauth/outlook/callback`,
    },
    sync: {
      intervalMinutes: positiveNumber(source.SYNC_INTERVAL_MINUTES, 5),
      maxMessages: positiveNumber(source.SYNC_MAX_MESSAGES, 50),
      concurrency: positiveNumber(source.SYNC_CONCURRENCY, 5),
      timeBudgetMs: positiveNumber(source.SYNC_TIME_BUDGET_MS, 240_000),
      leaseTtlMs: positiveNumber(source.SYNC_LEASE_TTL_MS, 300_000),
      retryBaseDelayMs: positiveNumber(source.SYNC_RETRY_BASE_MS, 60_000),
      maxRetryAttempts: positiveNumber(source.SYNC_RETRY_MAX_ATTEMPTS, 3),
      tokenSafetyMarginMs: positiveNumber(source.TOKEN_SAFETY_MARGIN_MS, 300_000),
      outlookMaxPages: positiveNumber(source.OUTLOOK_MAX_PAGES, 10),
    },
  };
};

export type Settings = ReturnType<typeof readSettings>;
