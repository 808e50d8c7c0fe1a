import { randomBytes } from 'node:crypto';
import type { Logger } from '../logger.js';
import { OAuthStateError } from '../shared/errors.js';
import type { AccountRecord, Provider } from '../shared/types.js';
import type { AccountRepository } from './accounts.js';
import type { CredentialCipher } from './encryption.js';
import { OAUTH_STATE_TTL_MS, type OAuthStateStore } from './oauthStates.js';
import { adapterFor, type ProviderAdapters } from './providers/types.js';

export interface AccountConnectorDeps {
  accounts: AccountRepository;
  states: OAuthStateStore;
  adapters: ProviderAdapters;
  cipher: CredentialCipher;
  /** Kicks off the first sync of a newly connected account. */
  triggerSync: (accountId: string) => Promise<void>;
  logger: Logger;
  now?: () => Date;
  createState?: () => string;
}

export class AccountConnector {
  private readonly now: () => Date;
  private readonly createState: () => string;

  constructor(private readonly deps: AccountConnectorDeps) {
    this.now = deps.now ?? (() => new Date());
    this.createState = deps.createState ?? (() => randomBytes(24).toString('base64url'));
  }

  async authorizeUrl(provider: Provider, userId: string) {
    const state = this.createState();
    await this.deps.states.create({
      state,
      userId,
      provider,
      expiresAt: new Date(this.now().getTime() + OAUTH_STATE_TTL_MS),
    });
    return adapterFor(this.deps.adapters, provider).authorizeUrl(state);
  }

  async complete(provider: Provider, code: string, state: string): Promise<AccountRecord> {
    const entry = await this.deps.states.consume(state);
    if (!entry || entry.provider !== provider) {
      throw new OAuthStateError();
    }
    if (entry.expiresAt.getTime() <= this.now().getTime()) {
      throw new OAuthStateError('OAuth state expired');
    }

    const adapter = adapterFor(this.deps.adapters, provider);
    const issued = await adapter.exchangeCode(code);
    const profile = await adapter.getProfile(issued.accessToken);

    const account = await this.deps.accounts.upsertConnectedAccount({
      userId: entry.userId,
      provider,
      emailAddress: profile.emailAddress,
      displayName: profile.displayName,
      accessToken: issued.accessToken,
      tokenExpiresAt: new Date(this.now().getTime() + issued.expiresIn * 1000),
      encryptedRefreshToken: issued.refreshToken ? this.deps.cipher.encrypt(issued.refreshToken) : null,
    });
    this.deps.logger.info(
      { accountId: account.id, provider, userId: entry.userId },
      'account connected',
    );

    try {
      await this.deps.triggerSync(account.id);
    } catch (error) {
      // The periodic tick picks the account up anyway.
      this.deps.logger.warn({ accountId: account.id, err: error }, 'failed to enqueue initial sync');
    }
    return account;
  }
}
