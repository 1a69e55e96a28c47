import type { Logger } from 'winston';
import { CredentialStore, TokenRefresher } from '../../domain/contracts';
import { CredentialNotFoundError } from '../../framework/errors';
import { TokenResult } from '../../types/relay';
import { truncate, MAX_ERROR_BODY_SIZE } from '../http/errors';

export const REFRESH_FAILED_MESSAGE = 'Failed to get updated token for athlete';

export interface TokenSource {
  getToken(athleteId: number): Promise<TokenResult>;
}

/**
 * Resolves a usable Strava access token for an athlete, refreshing and
 * persisting the stored credential once it has expired.
 *
 * There is no locking: two invocations refreshing the same athlete at once
 * both write, and the last write wins.
 */
export class StravaTokenSource implements TokenSource {
  constructor(
    private store: CredentialStore,
    private refresher: TokenRefresher,
    private logger: Logger,
    private now: () => Date = () => new Date()
  ) { }

  async getToken(athleteId: number): Promise<TokenResult> {
    const credential = await this.store.get(athleteId);
    if (!credential) {
      throw new CredentialNotFoundError(athleteId);
    }

    const nowSeconds = this.now().getTime() / 1000;
    if (nowSeconds < credential.expiresAt) {
      return { ok: true, accessToken: credential.accessToken };
    }

    this.logger.info('Token is expired. Refreshing now', { athleteId, expiresAt: credential.expiresAt });

    const outcome = await this.refresher.refresh(credential.refreshToken);
    if (!outcome.ok) {
      this.logger.error('Error refreshing token', {
        athleteId,
        status: outcome.status,
        body: truncate(outcome.body, MAX_ERROR_BODY_SIZE)
      });
      return { ok: false, statusCode: outcome.status, message: REFRESH_FAILED_MESSAGE };
    }

    await this.store.put({
      ...credential,
      accessToken: outcome.token.access_token,
      refreshToken: outcome.token.refresh_token,
      expiresAt: outcome.token.expires_at
    });

    this.logger.info('Stored refreshed token', { athleteId, expiresAt: outcome.token.expires_at });
    return { ok: true, accessToken: outcome.token.access_token };
  }
}
