import type { z } from 'zod';
import {
  AccessTokenRejectedError,
  PermanentProviderError,
  SyncTimeoutError,
  TransientProviderError,
} from '../../shared/errors.js';
import type { Provider } from '../../shared/types.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface CallOptions {
  signal?: AbortSignal;
}

export interface RequestOptions extends CallOptions {
  provider: Provider;
  fetchImpl: FetchLike;
  accessToken?: string;
  method?: string;
  json?: unknown;
  form?: Record<string, string>;
  headers?: Record<string, string>;
}

const MAX_ERROR_DETAIL_CHARS = 500;

const NETWORK_ERROR_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'EAI_AGAIN', 'ECONNREFUSED', 'EPIPE']);

const readCode = (value: unknown) =>
  typeof value === 'object' && value !== null && 'code' in value ? String(value.code) : '';

const readCause = (value: unknown): unknown =>
  typeof value === 'object' && value !== null && 'cause' in value ? value.cause : undefined;

const isRecoverableNetworkError = (error: unknown) => {
  const message = String(error).toLowerCase();
  return (
    NETWORK_ERROR_CODES.has(readCode(error))
    || NETWORK_ERROR_CODES.has(readCode(readCause(error)))
    || message.includes('fetch failed')
    || message.includes('timed out')
    || message.includes('timeout')
    || message.includes('network')
    || message.includes('socket')
  );
};

export const isRetryableStatus = (status: number) =>
  status === 429 || status === 408 || (status >= 500 && status <= 599);

const RATE_LIMIT_DETAIL = /rateLimitExceeded|userRateLimitExceeded|ApplicationThrottled|MailboxConcurrency/i;

export const abortReason = (signal: AbortSignal): Error =>
  signal.reason instanceof Error ? signal.reason : new SyncTimeoutError();

export const throwIfAborted = (signal?: AbortSignal) => {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
};

/** Settles with `promise`, or rejects as soon as `signal` aborts. */
export const raceWithSignal = <T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> => {
  if (!signal) {
    return promise;
  }
  throwIfAborted(signal);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
};

export const parseRetryAfterMs = (value: string | null, nowMs = Date.now()): number | null => {
  if (!value) {
    return null;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }
  const at = Date.parse(value);
  if (!Number.isFinite(at)) {
    return null;
  }
  return Math.max(0, at - nowMs);
};

export const errorForStatus = (
  provider: Provider,
  response: Pick<Response, 'status' | 'statusText' | 'headers'>,
  detail: string,
) => {
  const summary = `${provider} API ${response.status} ${response.statusText}`.trim();
  const trimmedDetail = detail.slice(0, MAX_ERROR_DETAIL_CHARS);
  if (response.status === 401) {
    return new AccessTokenRejectedError(provider, `${summary}: ${trimmedDetail}`);
  }
  if (isRetryableStatus(response.status) || (response.status === 403 && RATE_LIMIT_DETAIL.test(trimmedDetail))) {
    return new TransientProviderError(provider, `${summary}: ${trimmedDetail}`, {
      status: response.status,
      retryAfterMs: parseRetryAfterMs(response.headers.get('retry-after')),
    });
  }
  return new PermanentProviderError(provider, `${summary}: ${trimmedDetail}`, {
    status: response.status,
    detail: trimmedDetail,
  });
};

const buildBody = (options: RequestOptions): { body?: string; contentType?: string } => {
  if (options.form) {
    return {
      body: new URLSearchParams(options.form).toString(),
      contentType: 'application/x-www-form-urlencoded',
    };
  }
  if (options.json !== undefined) {
    return { body: JSON.stringify(options.json), contentType: 'application/json' };
  }
  return {};
};

/**
 * Performs one provider HTTP call and returns the decoded JSON body, or null when
 * the response has no content. Non-2xx responses and transport failures are mapped
 * onto the provider error taxonomy.
 */
export const requestJson = async (url: string, options: RequestOptions): Promise<unknown> => {
  throwIfAborted(options.signal);
  const { body, contentType } = buildBody(options);

  let response: Response;
  try {
    response = await options.fetchImpl(url, {
      method: options.method ?? (body === undefined ? 'GET' : 'POST'),
      headers: {
        Accept: 'application/json',
        ...(options.accessToken ? { Authorization: `Bearer ${options.accessToken}` } : {}),
        ...(contentType ? { 'Content-Type': contentType } : {}),
        ...(options.headers ?? {}),
      },
      body,
      signal: options.signal,
    });
  } catch (error) {
    if (options.signal?.aborted) {
      throw abortReason(options.signal);
    }
    if (isRecoverableNetworkError(error)) {
      throw new TransientProviderError(options.provider, `${options.provider} request failed: ${String(error)}`, {
        cause: error,
      });
    }
    throw error;
  }

  if (!response.ok) {
    const detail = await response.text().catch(() => '');
    throw errorForStatus(options.provider, response, detail);
  }

  const text = await response.text();
  if (response.status === 204 || !text.trim()) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new PermanentProviderError(options.provider, `${options.provider} API returned invalid JSON`, {
      status: response.status,
      detail: text.slice(0, MAX_ERROR_DETAIL_CHARS),
      cause: error,
    });
  }
};

export const parsePayload = <S extends z.ZodTypeAny>(
  provider: Provider,
  schema: S,
  payload: unknown,
  what: string,
): z.output<S> => {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new PermanentProviderError(provider, `${provider} returned an unexpected ${what} payload`, {
      detail: parsed.error.issues
        .slice(0, 3)
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; '),
    });
  }
  return parsed.data;
};

export const requestParsed = async <S extends z.ZodTypeAny>(
  url: string,
  schema: S,
  what: string,
  options: RequestOptions,
): Promise<z.output<S>> => parsePayload(options.provider, schema, await requestJson(url, options), what);
