import type { FailureKind, Provider } from './types.js';

export class MailSyncError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ProviderError extends MailSyncError {
  readonly provider: Provider;
  readonly status: number | null;

  constructor(
    code: string,
    provider: Provider,
    message: string,
    options: { status?: number | null; cause?: unknown } = {},
  ) {
    super(code, message, { cause: options.cause });
    this.provider = provider;
    this.status = options.status ?? null;
  }
}

/** Network failure, timeout, 408/429 or 5xx from a provider. */
export class TransientProviderError extends ProviderError {
  readonly retryAfterMs: number | null;

  constructor(
    provider: Provider,
    message: string,
    options: { status?: number | null; retryAfterMs?: number | null; cause?: unknown } = {},
  ) {
    super('provider_transient', provider, message, options);
    this.retryAfterMs = options.retryAfterMs ?? null;
  }
}

/** A data API rejected the access credential (HTTP 401). */
export class AccessTokenRejectedError extends ProviderError {
  constructor(provider: Provider, message: string, options: { cause?: unknown } = {}) {
    super('access_token_rejected', provider, message, { status: 401, cause: options.cause });
  }
}

/** The refresh credential is revoked, invalid or missing. Terminal until re-authorization. */
export class AuthExpiredError extends ProviderError {
  constructor(provider: Provider, message: string, options: { status?: number | null; cause?: unknown } = {}) {
    super('auth_expired', provider, message, options);
  }
}

export class AuthExchangeError extends ProviderError {
  constructor(provider: Provider, message: string, options: { status?: number | null; cause?: unknown } = {}) {
    super('auth_exchange_failed', provider, message, options);
  }
}

export class CursorInvalidError extends ProviderError {
  constructor(provider: Provider, message: string, options: { status?: number | null; cause?: unknown } = {}) {
    super('cursor_invalid', provider, message, options);
  }
}

/** Non-retryable 4xx or an upstream payload that does not match the expected shape. */
export class PermanentProviderError extends ProviderError {
  readonly detail: string;

  constructor(
    provider: Provider,
    message: string,
    options: { status?: number | null; detail?: string; cause?: unknown } = {},
  ) {
    super('provider_permanent', provider, message, options);
    this.detail = options.detail ?? '';
  }
}

export class MalformedRecordError extends MailSyncError {
  constructor(message: string) {
    super('malformed_record', message);
  }
}

export class KeyMismatchError extends MailSyncError {
  constructor(message = 'credential ciphertext was produced with a different key') {
    super('key_mismatch', message);
  }
}

export class SyncTimeoutError extends MailSyncError {
  constructor(budgetMs?: number) {
    super(
      'sync_timeout',
      budgetMs === undefined ? 'sync exceeded its time budget' : `sync exceeded its time budget of ${budgetMs}ms`,
    );
  }
}

export class DuplicateMessageError extends MailSyncError {
  constructor(providerMessageId: string) {
    super('duplicate_message', `message ${providerMessageId} already stored`);
  }
}

export class OAuthStateError extends MailSyncError {
  constructor(message = 'invalid or expired OAuth state') {
    super('oauth_state_invalid', message);
  }
}

export const classifyFailure = (error: unknown): FailureKind => {
  if (error instanceof AuthExpiredError) {
    return 'auth';
  }
  if (
    error instanceof PermanentProviderError
    || error instanceof AuthExchangeError
    || error instanceof KeyMismatchError
    || error instanceof MalformedRecordError
  ) {
    return 'permanent';
  }
  return 'transient';
};

export const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);
