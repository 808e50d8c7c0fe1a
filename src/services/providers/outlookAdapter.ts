import { z } from 'zod';
import {
  AccessTokenRejectedError,
  AuthExchangeError,
  AuthExpiredError,
  CursorInvalidError,
  MalformedRecordError,
  PermanentProviderError,
} from '../../shared/errors.js';
import type {
  AccessCredential,
  AttachmentMeta,
  CanonicalMessage,
  IssuedCredential,
  OutgoingDraft,
  OutlookCursor,
  ProviderProfile,
  ProviderSendResult,
} from '../../shared/types.js';
import {
  requestJson,
  requestParsed,
  type CallOptions,
  type FetchLike,
  type RequestOptions,
} from './http.js';
import { parseDateValue } from './parsing.js';
import type { DeltaResult, ProviderAdapter } from './types.js';

const GRAPH_API_BASE = 'https://graph.microsoft.com/v1.0';
const OUTLOOK_SCOPES = 'offline_access Mail.Read Mail.Send User.Read';
const MESSAGE_FIELDS = [
  'id',
  'conversationId',
  'subject',
  'bodyPreview',
  'body',
  'from',
  'toRecipients',
  'ccRecipients',
  'bccRecipients',
  'receivedDateTime',
  'sentDateTime',
  'hasAttachments',
].join(',');
const DEFAULT_EXPIRES_IN_SECONDS = 3600;
const REFRESH_REVOKED_REGEX = /invalid_grant|interaction_required|AADSTS70008|AADSTS700082|AADSTS50173/i;
const STALE_DELTA_REGEX = /syncStateNotFound|resyncRequired|syncStateInvalid/i;

const recipientSchema = z.object({
  emailAddress: z
    .object({
      name: z.string().nullish(),
      address: z.string().nullish(),
    })
    .nullish(),
});

const attachmentSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  contentType: z.string().nullish(),
  size: z.number().nullish(),
});

export const outlookMessageSchema = z.object({
  id: z.string().nullish(),
  conversationId: z.string().nullish(),
  subject: z.string().nullish(),
  bodyPreview: z.string().nullish(),
  body: z
    .object({
      contentType: z.string().nullish(),
      content: z.string().nullish(),
    })
    .nullish(),
  from: recipientSchema.nullish(),
  toRecipients: z.array(recipientSchema).nullish(),
  ccRecipients: z.array(recipientSchema).nullish(),
  bccRecipients: z.array(recipientSchema).nullish(),
  receivedDateTime: z.string().nullish(),
  sentDateTime: z.string().nullish(),
  hasAttachments: z.boolean().nullish(),
  attachments: z.array(attachmentSchema).optional(),
  '@removed': z.object({ reason: z.string().optional() }).optional(),
});

export type OutlookMessage = z.infer<typeof outlookMessageSchema>;
type OutlookRecipient = z.infer<typeof recipientSchema>;

const deltaPageSchema = z.object({
  value: z.array(outlookMessageSchema).default([]),
  '@odata.nextLink': z.string().optional(),
  '@odata.deltaLink': z.string().optional(),
});

const attachmentListSchema = z.object({
  value: z.array(attachmentSchema).default([]),
});

const tokenSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string().optional(),
  expires_in: z.union([z.number(), z.string()]).optional(),
});

const meSchema = z.object({
  mail: z.string().nullish(),
  userPrincipalName: z.string().nullish(),
  displayName: z.string().nullish(),
});

export interface OutlookAdapterOptions {
  clientId: string;
  clientSecret: string;
  tenant: string;
  redirectUri: string;
  maxMessages: number;
  maxPages: number;
  fetchImpl?: FetchLike;
  now?: () => Date;
}

const formatRecipient = (recipient: OutlookRecipient | null | undefined) => {
  const address = recipient?.emailAddress?.address ?? '';
  const name = recipient?.emailAddress?.name ?? '';
  if (name && address && name !== address) {
    return `${name} <${address}>`;
  }
  return address || name;
};

const formatRecipients = (recipients: OutlookRecipient[] | null | undefined) =>
  (recipients ?? []).map(formatRecipient).filter(Boolean);

const toGraphRecipients = (addresses: string[] | undefined) =>
  (addresses ?? []).map((address) => ({ emailAddress: { address } }));

const toIssuedCredential = (tokens: z.output<typeof tokenSchema>): IssuedCredential => {
  const expiresIn = Number(tokens.expires_in);
  return {
    accessToken: tokens.access_token,
    ...(tokens.refresh_token ? { refreshToken: tokens.refresh_token } : {}),
    expiresIn: Number.isFinite(expiresIn) && expiresIn >= 0 ? expiresIn : DEFAULT_EXPIRES_IN_SECONDS,
  };
};

const isStaleDeltaError = (error: unknown): error is PermanentProviderError =>
  error instanceof PermanentProviderError
  && (error.status === 410 || (error.status === 400 && STALE_DELTA_REGEX.test(error.detail)));

export class OutlookAdapter implements ProviderAdapter<'outlook'> {
  readonly provider = 'outlook' as const;

  private readonly fetchImpl: FetchLike;
  private readonly now: () => Date;

  constructor(private readonly options: OutlookAdapterOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? (() => new Date());
  }

  private get authority() {
    return `https://login.microsoftonline.com/${encodeURIComponent(this.options.tenant)}/oauth2/v2.0`;
  }

  authorizeUrl(state: string): string {
    const params = new URLSearchParams({
      client_id: this.options.clientId,
      response_type: 'code',
      redirect_uri: this.options.redirectUri,
      response_mode: 'query',
      scope: OUTLOOK_SCOPES,
      prompt: 'select_account',
      state,
    });
    return `${this.authority}/authorize?${params.toString()}`;
  }

  async exchangeCode(code: string, options: CallOptions = {}): Promise<IssuedCredential> {
    try {
      const tokens = await this.requestToken({
        grant_type: 'authorization_code',
        code,
        redirect_uri: this.options.redirectUri,
      }, options);
      return toIssuedCredential(tokens);
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }
      const status = error instanceof PermanentProviderError || error instanceof AccessTokenRejectedError
        ? error.status
        : null;
      throw new AuthExchangeError('outlook', `Microsoft code exchange failed: ${String(error)}`, {
        status,
        cause: error,
      });
    }
  }

  async refreshCredential(refreshToken: string, options: CallOptions = {}): Promise<IssuedCredential> {
    try {
      const tokens = await this.requestToken({
        grant_type: 'refresh_token',
        refresh_token: refreshToken,
      }, options);
      return toIssuedCredential(tokens);
    } catch (error) {
      if (error instanceof PermanentProviderError && REFRESH_REVOKED_REGEX.test(error.detail)) {
        throw new AuthExpiredError('outlook', 'Microsoft refresh token is invalid; user must reconnect account', {
          status: error.status,
          cause: error,
        });
      }
      if (error instanceof AccessTokenRejectedError) {
        throw new PermanentProviderError('outlook', `Microsoft token endpoint rejected the client: ${error.message}`, {
          status: 401,
          cause: error,
        });
      }
      throw error;
    }
  }

  async getProfile(accessToken: string, options: CallOptions = {}): Promise<ProviderProfile> {
    const me = await requestParsed(
      `${GRAPH_API_BASE}/me?$select=mail,userPrincipalName,displayName`,
      meSchema,
      'profile',
      this.request(accessToken, options),
    );
    const emailAddress = me.mail || me.userPrincipalName;
    if (!emailAddress) {
      throw new PermanentProviderError('outlook', 'Microsoft profile has no mail address');
    }
    return { emailAddress, displayName: me.displayName || null };
  }

  async fetchDelta(
    credential: AccessCredential,
    cursor: OutlookCursor | null,
    options: CallOptions = {},
  ): Promise<DeltaResult<'outlook'>> {
    if (cursor) {
      try {
        return await this.traverse(credential, cursor.deltaLink, 'incremental', options);
      } catch (error) {
        if (!(error instanceof CursorInvalidError)) {
          throw error;
        }
      }
    }
    const initial = `${GRAPH_API_BASE}/me/mailFolders/inbox/messages/delta?$select=${MESSAGE_FIELDS}`;
    return this.traverse(credential, initial, 'full', options);
  }

  parseRecord(raw: OutlookMessage): CanonicalMessage {
    if (!raw.id) {
      throw new MalformedRecordError('outlook message has no id');
    }

    const attachments: AttachmentMeta[] = (raw.attachments ?? []).map((attachment) => ({
      providerAttachmentId: attachment.id,
      filename: attachment.name ?? '',
      mimeType: attachment.contentType ?? null,
      size: typeof attachment.size === 'number' ? attachment.size : null,
    }));

    const contentType = (raw.body?.contentType ?? '').toLowerCase();
    const content = raw.body?.content ?? '';

    return {
      providerMessageId: raw.id,
      providerThreadId: raw.conversationId || raw.id,
      from: formatRecipient(raw.from),
      to: formatRecipients(raw.toRecipients),
      cc: formatRecipients(raw.ccRecipients),
      bcc: formatRecipients(raw.bccRecipients),
      subject: raw.subject ?? '',
      date: parseDateValue(raw.receivedDateTime) ?? parseDateValue(raw.sentDateTime) ?? this.now(),
      bodyText: contentType === 'html' ? '' : content,
      bodyHtml: contentType === 'html' ? content : '',
      snippet: raw.bodyPreview ?? '',
      attachments,
      hasAttachments: Boolean(raw.hasAttachments) || attachments.length > 0,
    };
  }

  async sendMessage(
    credential: AccessCredential,
    draft: OutgoingDraft,
    options: CallOptions = {},
  ): Promise<ProviderSendResult> {
    const message = {
      subject: draft.subject,
      body: draft.bodyHtml
        ? { contentType: 'HTML', content: draft.bodyHtml }
        : { contentType: 'Text', content: draft.bodyText ?? '' },
      toRecipients: toGraphRecipients(draft.to),
      ccRecipients: toGraphRecipients(draft.cc),
      bccRecipients: toGraphRecipients(draft.bcc),
    };

    if (draft.replyToProviderMessageId) {
      await requestJson(
        `${GRAPH_API_BASE}/me/messages/${encodeURIComponent(draft.replyToProviderMessageId)}/reply`,
        { ...this.request(credential.accessToken, options), method: 'POST', json: { message } },
      );
    } else {
      await requestJson(`${GRAPH_API_BASE}/me/sendMail`, {
        ...this.request(credential.accessToken, options),
        method: 'POST',
        json: { message, saveToSentItems: true },
      });
    }

    // Graph answers 202 with no body; the sent item id is not returned.
    return {
      status: 'sent',
      providerMessageId: null,
      providerThreadId: draft.providerThreadId ?? null,
    };
  }

  private request(accessToken: string, options: CallOptions): RequestOptions {
    return {
      provider: 'outlook',
      fetchImpl: this.fetchImpl,
      accessToken,
      signal: options.signal,
    };
  }

  private async requestToken(form: Record<string, string>, options: CallOptions) {
    return requestParsed(`${this.authority}/token`, tokenSchema, 'token', {
      provider: 'outlook',
      fetchImpl: this.fetchImpl,
      signal: options.signal,
      form: {
        client_id: this.options.clientId,
        client_secret: this.options.clientSecret,
        scope: OUTLOOK_SCOPES,
        ...form,
      },
    });
  }

  private async traverse(
    credential: AccessCredential,
    startUrl: string,
    mode: DeltaResult<'outlook'>['mode'],
    options: CallOptions,
  ): Promise<DeltaResult<'outlook'>> {
    const records: OutlookMessage[] = [];
    let url = startUrl;
    let pages = 0;
    let link: string | null = null;

    while (link === null) {
      let page: z.output<typeof deltaPageSchema>;
      try {
        page = await requestParsed(url, deltaPageSchema, 'delta page', {
          ...this.request(credential.accessToken, options),
          headers: { Prefer: `odata.maxpagesize=${this.options.maxMessages}` },
        });
      } catch (error) {
        if (isStaleDeltaError(error)) {
          throw new CursorInvalidError('outlook', 'delta token is no longer valid', {
            status: error.status,
            cause: error,
          });
        }
        throw error;
      }
      pages += 1;

      for (const entry of page.value) {
        if (!entry['@removed']) {
          records.push(entry);
        }
      }

      const deltaLink = page['@odata.deltaLink'];
      const nextLink = page['@odata.nextLink'];
      if (deltaLink) {
        link = deltaLink;
      } else if (!nextLink) {
        throw new PermanentProviderError('outlook', 'delta page carried neither nextLink nor deltaLink');
      } else if (pages >= this.options.maxPages) {
        // Resume the traversal next sync.
        link = nextLink;
      } else {
        url = nextLink;
      }
    }

    for (const record of records) {
      if (record.hasAttachments && record.id) {
        record.attachments = await this.listAttachments(credential, record.id, options);
      }
    }

    return {
      records,
      nextCursor: { provider: 'outlook', deltaLink: link },
      mode,
    };
  }

  private async listAttachments(credential: AccessCredential, messageId: string, options: CallOptions) {
    try {
      const list = await requestParsed(
        `${GRAPH_API_BASE}/me/messages/${encodeURIComponent(messageId)}/attachments?$select=id,name,contentType,size`,
        attachmentListSchema,
        'attachment list',
        this.request(credential.accessToken, options),
      );
      return list.value;
    } catch (error) {
      if (error instanceof PermanentProviderError && error.status === 404) {
        return [];
      }
      throw error;
    }
  }
}
