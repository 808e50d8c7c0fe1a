import nodemailer from 'nodemailer';
import { OAuth2Client } from 'google-auth-library';
import type { Credentials, GenerateAuthUrlOpts } from 'google-auth-library';
import { z } from 'zod';
import {
  AuthExchangeError,
  AuthExpiredError,
  CursorInvalidError,
  MalformedRecordError,
  PermanentProviderError,
  TransientProviderError,
} from '../../shared/errors.js';
import type {
  AccessCredential,
  AttachmentMeta,
  CanonicalMessage,
  GmailCursor,
  IssuedCredential,
  OutgoingDraft,
  ProviderProfile,
  ProviderSendResult,
} from '../../shared/types.js';
import {
  isRetryableStatus,
  raceWithSignal,
  requestParsed,
  type CallOptions,
  type FetchLike,
  type RequestOptions,
} from './http.js';
import { decodeBase64Url, parseDateValue, splitAddressList } from './parsing.js';
import type { DeltaResult, ProviderAdapter } from './types.js';

const GMAIL_API_BASE = 'https://gmail.googleapis.com/gmail/v1/users/me';
const GOOGLE_SCOPES = [
  'https://www.googleapis.com/auth/gmail.readonly',
  'https://www.googleapis.com/auth/gmail.send',
  'https://www.googleapis.com/auth/userinfo.email',
];
const INVALID_GRANT_REGEX = /invalid[_\s-]grant|token has been (expired or )?revoked|unauthorized_client|disabled/i;
const DEFAULT_EXPIRES_IN_SECONDS = 3600;
const HISTORY_PAGE_SIZE = 500;

export interface GmailMessagePart {
  mimeType?: string;
  filename?: string;
  headers?: Array<{ name?: string; value?: string }>;
  body?: { attachmentId?: string; size?: number; data?: string };
  parts?: GmailMessagePart[];
}

const gmailPartSchema: z.ZodType<GmailMessagePart> = z.lazy(() =>
  z.object({
    mimeType: z.string().optional(),
    filename: z.string().optional(),
    headers: z.array(z.object({ name: z.string().optional(), value: z.string().optional() })).optional(),
    body: z
      .object({
        attachmentId: z.string().optional(),
        size: z.number().optional(),
        data: z.string().optional(),
      })
      .optional(),
    parts: z.array(gmailPartSchema).optional(),
  }),
);

export const gmailMessageSchema = z.object({
  id: z.string().optional(),
  threadId: z.string().optional(),
  snippet: z.string().optional(),
  internalDate: z.string().optional(),
  labelIds: z.array(z.string()).optional(),
  payload: gmailPartSchema.optional(),
});

export type GmailMessage = z.infer<typeof gmailMessageSchema>;

const historyIdSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

const profileSchema = z.object({
  emailAddress: z.string(),
  historyId: historyIdSchema.optional(),
});

const messageListSchema = z.object({
  messages: z.array(z.object({ id: z.string(), threadId: z.string().optional() })).optional(),
  nextPageToken: z.string().optional(),
});

const historyListSchema = z.object({
  history: z
    .array(
      z.object({
        id: historyIdSchema.optional(),
        messagesAdded: z
          .array(z.object({ message: z.object({ id: z.string(), labelIds: z.array(z.string()).optional() }) }))
          .optional(),
      }),
    )
    .optional(),
  historyId: historyIdSchema.optional(),
  nextPageToken: z.string().optional(),
});

const sendResponseSchema = z.object({
  id: z.string().optional(),
  threadId: z.string().optional(),
});

/** The slice of google-auth-library's OAuth2Client used here. */
export interface GoogleTokenClient {
  generateAuthUrl(opts: GenerateAuthUrlOpts): string;
  getToken(code: string): Promise<{ tokens: Credentials }>;
  setCredentials(credentials: Credentials): void;
  refreshAccessToken(): Promise<{ credentials: Credentials }>;
}

export interface GmailAdapterOptions {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  maxMessages: number;
  fetchImpl?: FetchLike;
  createOAuthClient?: () => GoogleTokenClient;
  now?: () => Date;
}

const readStatus = (error: unknown): number | null => {
  if (typeof error !== 'object' || error === null || !('response' in error)) {
    return null;
  }
  const response = error.response;
  if (typeof response !== 'object' || response === null || !('status' in response)) {
    return null;
  }
  return typeof response.status === 'number' ? response.status : null;
};

const expiresInFrom = (tokens: Credentials, nowMs: number) => {
  if (typeof tokens.expiry_date !== 'number') {
    return DEFAULT_EXPIRES_IN_SECONDS;
  }
  return Math.max(0, Math.round((tokens.expiry_date - nowMs) / 1000));
};

interface WalkState {
  text: string | null;
  html: string | null;
  attachments: AttachmentMeta[];
}

const walkParts = (part: GmailMessagePart, state: WalkState) => {
  const mimeType = (part.mimeType ?? '').toLowerCase();
  const filename = part.filename ?? '';
  if (filename && part.body?.attachmentId) {
    state.attachments.push({
      providerAttachmentId: part.body.attachmentId,
      filename,
      mimeType: part.mimeType || null,
      size: typeof part.body.size === 'number' ? part.body.size : null,
    });
  } else if (!filename && part.body?.data) {
    if ((mimeType === 'text/plain' || mimeType === '') && state.text === null) {
      state.text = decodeBase64Url(part.body.data);
    } else if (mimeType === 'text/html' && state.html === null) {
      state.html = decodeBase64Url(part.body.data);
    }
  }
  for (const child of part.parts ?? []) {
    walkParts(child, state);
  }
};

export class GmailAdapter implements ProviderAdapter<'gmail'> {
  readonly provider = 'gmail' as const;

  private readonly fetchImpl: FetchLike;
  private readonly now: () => Date;
  private readonly createOAuthClient: () => GoogleTokenClient;

  constructor(private readonly options: GmailAdapterOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? (() => new Date());
    this.createOAuthClient = options.createOAuthClient
      ?? (() => new OAuth2Client({
        clientId: options.clientId,
        clientSecret: options.clientSecret,
        redirectUri: options.redirectUri,
      }));
  }

  authorizeUrl(state: string): string {
    return this.createOAuthClient().generateAuthUrl({
      scope: GOOGLE_SCOPES,
      access_type: 'offline',
      prompt: 'consent',
      include_granted_scopes: true,
      state,
    });
  }

  async exchangeCode(code: string, options: CallOptions = {}): Promise<IssuedCredential> {
    let tokens: Credentials;
    try {
      ({ tokens } = await raceWithSignal(this.createOAuthClient().getToken(code), options.signal));
    } catch (error) {
      throw new AuthExchangeError('gmail', `Google code exchange failed: ${String(error)}`, {
        status: readStatus(error),
        cause: error,
      });
    }
    if (!tokens.access_token) {
      throw new AuthExchangeError('gmail', 'Google OAuth returned no access token');
    }
    return {
      accessToken: tokens.access_token,
      ...(tokens.refresh_token ? { refreshToken: tokens.refresh_token } : {}),
      expiresIn: expiresInFrom(tokens, this.now().getTime()),
    };
  }

  async refreshCredential(refreshToken: string, options: CallOptions = {}): Promise<IssuedCredential> {
    const client = this.createOAuthClient();
    client.setCredentials({ refresh_token: refreshToken });

    let credentials: Credentials;
    try {
      ({ credentials } = await raceWithSignal(client.refreshAccessToken(), options.signal));
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }
      const status = readStatus(error);
      if (INVALID_GRANT_REGEX.test(String(error))) {
        throw new AuthExpiredError('gmail', 'Google refresh token is invalid; user must reconnect account', {
          status,
          cause: error,
        });
      }
      if (status === null || isRetryableStatus(status)) {
        throw new TransientProviderError('gmail', `Google token refresh failed: ${String(error)}`, {
          status,
          cause: error,
        });
      }
      throw new PermanentProviderError('gmail', `Google token refresh rejected: ${String(error)}`, {
        status,
        cause: error,
      });
    }

    if (!credentials.access_token) {
      throw new PermanentProviderError('gmail', 'Google token refresh returned no access token');
    }
    return {
      accessToken: credentials.access_token,
      ...(credentials.refresh_token && credentials.refresh_token !== refreshToken
        ? { refreshToken: credentials.refresh_token }
        : {}),
      expiresIn: expiresInFrom(credentials, this.now().getTime()),
    };
  }

  async getProfile(accessToken: string, options: CallOptions = {}): Promise<ProviderProfile> {
    const profile = await requestParsed(`${GMAIL_API_BASE}/profile`, profileSchema, 'profile', this.request(accessToken, options));
    return { emailAddress: profile.emailAddress, displayName: null };
  }

  async fetchDelta(
    credential: AccessCredential,
    cursor: GmailCursor | null,
    options: CallOptions = {},
  ): Promise<DeltaResult<'gmail'>> {
    if (cursor) {
      try {
        return await this.fetchHistory(credential, cursor.historyId, options);
      } catch (error) {
        if (!(error instanceof CursorInvalidError)) {
          throw error;
        }
      }
    }
    return this.fetchRecent(credential, options);
  }

  parseRecord(raw: GmailMessage): CanonicalMessage {
    if (!raw.id) {
      throw new MalformedRecordError('gmail message has no id');
    }

    const headers = new Map<string, string>();
    for (const header of raw.payload?.headers ?? []) {
      const name = (header.name ?? '').toLowerCase();
      if (name && !headers.has(name)) {
        headers.set(name, header.value ?? '');
      }
    }

    const state: WalkState = { text: null, html: null, attachments: [] };
    if (raw.payload) {
      walkParts(raw.payload, state);
    }

    const internalDate = raw.internalDate ? Number(raw.internalDate) : null;
    const date = parseDateValue(headers.get('date'))
      ?? parseDateValue(internalDate)
      ?? this.now();

    return {
      providerMessageId: raw.id,
      providerThreadId: raw.threadId || raw.id,
      from: headers.get('from') ?? '',
      to: splitAddressList(headers.get('to')),
      cc: splitAddressList(headers.get('cc')),
      bcc: splitAddressList(headers.get('bcc')),
      subject: headers.get('subject') ?? '',
      date,
      bodyText: state.text ?? '',
      bodyHtml: state.html ?? '',
      snippet: raw.snippet ?? '',
      attachments: state.attachments,
      hasAttachments: state.attachments.length > 0,
    };
  }

  async sendMessage(
    credential: AccessCredential,
    draft: OutgoingDraft,
    options: CallOptions = {},
  ): Promise<ProviderSendResult> {
    const transport = nodemailer.createTransport({ streamTransport: true, buffer: true, newline: 'unix' });
    const info = await transport.sendMail({
      from: draft.from,
      to: draft.to.join(', '),
      cc: draft.cc?.join(', '),
      bcc: draft.bcc?.join(', '),
      subject: draft.subject,
      text: draft.bodyText,
      html: draft.bodyHtml,
      inReplyTo: draft.inReplyTo,
      references: draft.references,
    });
    if (!Buffer.isBuffer(info.message)) {
      throw new Error('message composer did not produce a buffered message');
    }

    const sent = await requestParsed(`${GMAIL_API_BASE}/messages/send`, sendResponseSchema, 'send', {
      ...this.request(credential.accessToken, options),
      method: 'POST',
      json: {
        raw: info.message.toString('base64url'),
        ...(draft.providerThreadId ? { threadId: draft.providerThreadId } : {}),
      },
    });
    return {
      status: 'sent',
      providerMessageId: sent.id ?? null,
      providerThreadId: sent.threadId ?? null,
    };
  }

  private request(accessToken: string, options: CallOptions): RequestOptions {
    return {
      provider: 'gmail',
      fetchImpl: this.fetchImpl,
      accessToken,
      signal: options.signal,
    };
  }

  private async getMessage(credential: AccessCredential, id: string, options: CallOptions) {
    return requestParsed(
      `${GMAIL_API_BASE}/messages/${encodeURIComponent(id)}?format=full`,
      gmailMessageSchema,
      'message',
      this.request(credential.accessToken, options),
    );
  }

  private async getMessages(credential: AccessCredential, ids: string[], options: CallOptions) {
    const records: GmailMessage[] = [];
    for (const id of ids) {
      try {
        records.push(await this.getMessage(credential, id, options));
      } catch (error) {
        // Deleted between listing and messages.get.
        if (error instanceof PermanentProviderError && error.status === 404) {
          continue;
        }
        throw error;
      }
    }
    return records;
  }

  private async fetchRecent(credential: AccessCredential, options: CallOptions): Promise<DeltaResult<'gmail'>> {
    // The cursor is read before listing so mail arriving mid-listing is fetched again next time.
    const profile = await requestParsed(
      `${GMAIL_API_BASE}/profile`,
      profileSchema,
      'profile',
      this.request(credential.accessToken, options),
    );
    if (!profile.historyId) {
      throw new PermanentProviderError('gmail', 'Gmail profile has no historyId');
    }

    const params = new URLSearchParams({ labelIds: 'INBOX', maxResults: String(this.options.maxMessages) });
    const list = await requestParsed(
      `${GMAIL_API_BASE}/messages?${params.toString()}`,
      messageListSchema,
      'message list',
      this.request(credential.accessToken, options),
    );

    const records = await this.getMessages(credential, (list.messages ?? []).map((entry) => entry.id), options);

    return {
      records,
      nextCursor: { provider: 'gmail', historyId: profile.historyId },
      mode: 'full',
    };
  }

  private async fetchHistory(
    credential: AccessCredential,
    startHistoryId: string,
    options: CallOptions,
  ): Promise<DeltaResult<'gmail'>> {
    const addedIds: string[] = [];
    const seen = new Set<string>();
    let latestHistoryId = startHistoryId;
    let consumedHistoryId: string | null = null;
    let truncated = false;
    let pageToken: string | undefined;

    do {
      const params = new URLSearchParams({
        startHistoryId,
        historyTypes: 'messageAdded',
        labelId: 'INBOX',
        maxResults: String(HISTORY_PAGE_SIZE),
      });
      if (pageToken) {
        params.set('pageToken', pageToken);
      }

      let page: z.output<typeof historyListSchema>;
      try {
        page = await requestParsed(
          `${GMAIL_API_BASE}/history?${params.toString()}`,
          historyListSchema,
          'history',
          this.request(credential.accessToken, options),
        );
      } catch (error) {
        if (error instanceof PermanentProviderError && error.status === 404) {
          throw new CursorInvalidError('gmail', `history ${startHistoryId} is no longer available`, {
            status: 404,
            cause: error,
          });
        }
        throw error;
      }

      // History records are taken whole; once maxMessages ids are collected the
      // sync stops at a record boundary and resumes after it next time.
      for (const entry of page.history ?? []) {
        if (addedIds.length >= this.options.maxMessages && consumedHistoryId !== null) {
          truncated = true;
          break;
        }
        for (const added of entry.messagesAdded ?? []) {
          if (!seen.has(added.message.id)) {
            seen.add(added.message.id);
            addedIds.push(added.message.id);
          }
        }
        consumedHistoryId = entry.id ?? consumedHistoryId;
      }
      if (truncated) {
        break;
      }
      latestHistoryId = page.historyId ?? latestHistoryId;
      pageToken = page.nextPageToken || undefined;
    } while (pageToken);

    const records = await this.getMessages(credential, addedIds, options);

    const nextHistoryId = truncated && consumedHistoryId ? consumedHistoryId : latestHistoryId;
    return {
      records,
      nextCursor: { provider: 'gmail', historyId: nextHistoryId },
      mode: 'incremental',
    };
  }
}
