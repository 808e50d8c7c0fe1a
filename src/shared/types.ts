export const PROVIDERS = ['gmail', 'outlook'] as const;
export type Provider = (typeof PROVIDERS)[number];

export const isProvider = (value: unknown): value is Provider =>
  typeof value === 'string' && PROVIDERS.some((provider) => provider === value);

export interface GmailCursor {
  provider: 'gmail';
  historyId: string;
}

export interface OutlookCursor {
  provider: 'outlook';
  deltaLink: string;
}

export type SyncCursor = GmailCursor | OutlookCursor;

export type CursorFor<P extends Provider> = Extract<SyncCursor, { provider: P }>;

export const isCursorFor = <P extends Provider>(provider: P, cursor: SyncCursor): cursor is CursorFor<P> =>
  cursor.provider === provider;

export interface AccountRecord {
  id: string;
  userId: string;
  provider: Provider;
  emailAddress: string;
  displayName: string | null;
  accessToken: string | null;
  encryptedRefreshToken: string | null;
  tokenExpiresAt: Date | null;
  cursor: SyncCursor | null;
  lastSyncedAt: Date | null;
  active: boolean;
  syncError: string | null;
  deactivatedReason: string | null;
}

export interface ThreadRecord {
  id: string;
  accountId: string;
  providerThreadId: string;
  subject: string;
  snippet: string;
  lastMessageAt: Date;
}

export interface AttachmentMeta {
  providerAttachmentId: string;
  filename: string;
  mimeType: string | null;
  size: number | null;
}

export interface CanonicalMessage {
  providerMessageId: string;
  providerThreadId: string;
  from: string;
  to: string[];
  cc: string[];
  bcc: string[];
  subject: string;
  date: Date;
  bodyText: string;
  bodyHtml: string;
  snippet: string;
  attachments: AttachmentMeta[];
  hasAttachments: boolean;
}

/** Tokens as issued by a provider's token endpoint. `expiresIn` is in seconds. */
export interface IssuedCredential {
  accessToken: string;
  refreshToken?: string;
  expiresIn: number;
}

export interface AccessCredential {
  accessToken: string;
  expiresAt: Date;
}

export interface ProviderProfile {
  emailAddress: string;
  displayName: string | null;
}

export type FetchMode = 'full' | 'incremental';

export type FailureKind = 'transient' | 'auth' | 'permanent';

export type RetryDecision =
  | { action: 'retry'; attempt: number; delayMs: number }
  | { action: 'abandon'; reason: string }
  | { action: 'deactivate' };

export type SkipReason = 'in progress' | 'account not found' | 'account inactive';

export type SyncResult =
  | {
    status: 'success';
    messagesIngested: number;
    duplicatesSkipped: number;
    recordsRejected: number;
    mode: FetchMode;
  }
  | { status: 'skipped'; reason: SkipReason; messagesIngested: 0 }
  | {
    status: 'failed';
    failure: FailureKind;
    error: string;
    retry: RetryDecision;
    messagesIngested: 0;
  };

export interface OutgoingDraft {
  from?: string;
  to: string[];
  cc?: string[];
  bcc?: string[];
  subject: string;
  bodyText?: string;
  bodyHtml?: string;
  inReplyTo?: string;
  references?: string;
  /** Provider message id being replied to (Outlook replies go through the message endpoint). */
  replyToProviderMessageId?: string;
  providerThreadId?: string;
}

export interface ProviderSendResult {
  status: 'sent';
  providerMessageId: string | null;
  providerThreadId: string | null;
}

export interface AccountState {
  id: string;
  provider: Provider;
  emailAddress: string;
  displayName: string | null;
  active: boolean;
  needsReauth: boolean;
  lastSyncedAt: string | null;
  syncError: string | null;
}

export const toAccountState = (account: AccountRecord): AccountState => ({
  id: account.id,
  provider: account.provider,
  emailAddress: account.emailAddress,
  displayName: account.displayName,
  active: account.active,
  needsReauth: !account.active,
  lastSyncedAt: account.lastSyncedAt ? account.lastSyncedAt.toISOString() : null,
  syncError: account.syncError,
});
