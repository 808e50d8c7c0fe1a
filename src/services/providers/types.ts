import type {
  AccessCredential,
  CanonicalMessage,
  CursorFor,
  FetchMode,
  IssuedCredential,
  OutgoingDraft,
  Provider,
  ProviderProfile,
  ProviderSendResult,
} from '../../shared/types.js';
import type { GmailMessage } from './gmailAdapter.js';
import type { OutlookMessage } from './outlookAdapter.js';
import type { CallOptions } from './http.js';

export interface RawRecordMap {
  gmail: GmailMessage;
  outlook: OutlookMessage;
}

export interface DeltaResult<P extends Provider> {
  records: Array<RawRecordMap[P]>;
  nextCursor: CursorFor<P>;
  mode: FetchMode;
}

/**
 * One external mail API. Each variant only ever receives its own cursor shape;
 * a stale cursor is handled inside `fetchDelta` by falling back to a full fetch.
 */
export interface ProviderAdapter<P extends Provider> {
  readonly provider: P;
  authorizeUrl(state: string): string;
  exchangeCode(code: string, options?: CallOptions): Promise<IssuedCredential>;
  refreshCredential(refreshToken: string, options?: CallOptions): Promise<IssuedCredential>;
  getProfile(accessToken: string, options?: CallOptions): Promise<ProviderProfile>;
  fetchDelta(
    credential: AccessCredential,
    cursor: CursorFor<P> | null,
    options?: CallOptions,
  ): Promise<DeltaResult<P>>;
  parseRecord(raw: RawRecordMap[P]): CanonicalMessage;
  sendMessage(
    credential: AccessCredential,
    draft: OutgoingDraft,
    options?: CallOptions,
  ): Promise<ProviderSendResult>;
}

export type ProviderAdapters = { [P in Provider]: ProviderAdapter<P> };

export const adapterFor = (adapters: ProviderAdapters, provider: Provider): ProviderAdapter<Provider> =>
  adapters[provider];
