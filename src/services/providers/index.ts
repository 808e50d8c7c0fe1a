import type { Settings } from '../../config/settings.js';
import { GmailAdapter, type GoogleTokenClient } from './gmailAdapter.js';
import type { FetchLike } from './http.js';
import { OutlookAdapter } from './outlookAdapter.js';
import type { ProviderAdapters } from './types.js';

export interface AdapterOverrides {
  fetchImpl?: FetchLike;
  createGoogleClient?: () => GoogleTokenClient;
  now?: () => Date;
}

export const createProviderAdapters = (
  settings: Pick<Settings, 'google' | 'microsoft' | 'sync'>,
  overrides: AdapterOverrides = {},
): ProviderAdapters => ({
  gmail: new GmailAdapter({
    ...settings.google,
    maxMessages: settings.sync.maxMessages,
    fetchImpl: overrides.fetchImpl,
    createOAuthClient: overrides.createGoogleClient,
    now: overrides.now,
  }),
  outlook: new OutlookAdapter({
    ...settings.microsoft,
    maxMessages: settings.sync.maxMessages,
    maxPages: settings.sync.outlookMaxPages,
    fetchImpl: overrides.fetchImpl,
    now: overrides.now,
  }),
});

export type { ProviderAdapter, ProviderAdapters, DeltaResult, RawRecordMap } from './types.js';
export { adapterFor } from './types.js';
