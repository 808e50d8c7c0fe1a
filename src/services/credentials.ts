import type { Logger } from '../logger.js';
import { AuthExpiredError } from '../shared/errors.js';
import type { AccessCredential, AccountRecord, IssuedCredential } from '../shared/types.js';
import type { AccountRepository } from './accounts.js';
import type { CredentialCipher } from './encryption.js';
import { adapterFor, type ProviderAdapters } from './providers/types.js';
import type { CallOptions } from './providers/http.js';

export interface EnsureValidOptions extends CallOptions {
  /** Refresh even if the stored access credential looks fresh (it was just rejected). */
  forceRefresh?: boolean;
}

export interface ValidCredential {
  /** The account as stored after any refresh. */
  account: AccountRecord;
  credential: AccessCredential;
}

export interface CredentialManagerDeps {
  accounts: AccountRepository;
  adapters: ProviderAdapters;
  cipher: CredentialCipher;
  logger: Logger;
  safetyMarginMs: number;
  now?: () => Date;
}

export class CredentialManager {
  private readonly now: () => Date;

  constructor(private readonly deps: CredentialManagerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  isFresh(account: AccountRecord, at = this.now()) {
    return Boolean(
      account.accessToken
      && account.tokenExpiresAt
      && account.tokenExpiresAt.getTime() > at.getTime() + this.deps.safetyMarginMs,
    );
  }

  /**
   * Returns an access credential that will not expire within the safety margin,
   * refreshing it first when needed. An `AuthExpiredError` deactivates the account
   * before it is rethrown.
   */
  async ensureValid(account: AccountRecord, options: EnsureValidOptions = {}): Promise<ValidCredential> {
    if (!options.forceRefresh && this.isFresh(account) && account.accessToken && account.tokenExpiresAt) {
      return {
        account,
        credential: { accessToken: account.accessToken, expiresAt: account.tokenExpiresAt },
      };
    }

    if (!account.encryptedRefreshToken) {
      const error = new AuthExpiredError(account.provider, 'refresh credential missing');
      await this.deactivate(account, error);
      throw error;
    }

    // KeyMismatchError propagates: the deployment key changed, not the user's grant.
    const refreshToken = this.deps.cipher.decrypt(account.encryptedRefreshToken);

    const adapter = adapterFor(this.deps.adapters, account.provider);
    let issued: IssuedCredential;
    try {
      issued = await adapter.refreshCredential(refreshToken, { signal: options.signal });
    } catch (error) {
      if (error instanceof AuthExpiredError) {
        await this.deactivate(account, error);
      }
      throw error;
    }

    const expiresAt = new Date(this.now().getTime() + issued.expiresIn * 1000);
    const rotated = issued.refreshToken ? this.deps.cipher.encrypt(issued.refreshToken) : undefined;

    await this.deps.accounts.updateCredentials(account.id, {
      accessToken: issued.accessToken,
      tokenExpiresAt: expiresAt,
      ...(rotated ? { encryptedRefreshToken: rotated } : {}),
    });
    this.deps.logger.debug(
      { accountId: account.id, provider: account.provider, rotated: Boolean(rotated) },
      'access credential refreshed',
    );

    return {
      account: {
        ...account,
        accessToken: issued.accessToken,
        tokenExpiresAt: expiresAt,
        encryptedRefreshToken: rotated ?? account.encryptedRefreshToken,
      },
      credential: { accessToken: issued.accessToken, expiresAt },
    };
  }

  async deactivate(account: AccountRecord, error: AuthExpiredError) {
    await this.deps.accounts.deactivateAccount(account.id, error.message);
    this.deps.logger.warn(
      { accountId: account.id, provider: account.provider, reason: error.message },
      'account deactivated; re-authorization required',
    );
  }
}
