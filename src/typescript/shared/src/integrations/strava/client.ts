import type { Logger } from 'winston';
import { ActivityProvider, RefreshOutcome, TokenRefresher } from '../../domain/contracts';
import { parseErrorResponse, wrapFetchWithErrorLogging } from '../../infrastructure/http/errors';
import { decode } from '../../types/decode';
import {
  PushSubscription,
  pushSubscriptionSchema,
  StravaActivity,
  stravaActivitySchema,
  StravaAthlete,
  stravaAthleteSchema,
  stravaTokenResponseSchema
} from '../../types/strava';

export interface StravaClientOptions {
  apiBaseUrl: string;
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
}

/**
 * Thin Strava API v3 client: the two reads the relay needs, token refresh,
 * and push subscription management for operators.
 */
export class StravaClient implements ActivityProvider, TokenRefresher {
  private readonly fetchFn: typeof fetch;

  constructor(
    private readonly options: StravaClientOptions,
    logger: Pick<Logger, 'error'>,
    fetchFn: typeof fetch = fetch
  ) {
    this.fetchFn = wrapFetchWithErrorLogging(fetchFn, logger, 'strava');
  }

  async getActivity(activityId: number, accessToken: string): Promise<StravaActivity> {
    const body = await this.getJson(`/activities/${activityId}`, accessToken);
    return decode(stravaActivitySchema, body, `Strava activity ${activityId}`);
  }

  async getAthlete(accessToken: string): Promise<StravaAthlete> {
    const body = await this.getJson('/athlete', accessToken);
    return decode(stravaAthleteSchema, body, 'Strava athlete');
  }

  /**
   * Exchanges a refresh token. A rejected refresh is returned, not thrown,
   * so the caller can pass the upstream status through.
   */
  async refresh(refreshToken: string): Promise<RefreshOutcome> {
    const response = await this.fetchFn(this.options.tokenUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        client_id: this.options.clientId,
        client_secret: this.options.clientSecret,
        refresh_token: refreshToken,
        grant_type: 'refresh_token'
      })
    });

    if (response.status !== 200) {
      return { ok: false, status: response.status, body: await response.text() };
    }

    return { ok: true, token: decode(stravaTokenResponseSchema, await response.json(), 'Strava token response') };
  }

  async listSubscriptions(): Promise<PushSubscription[]> {
    const response = await this.fetchFn(`${this.subscriptionsUrl()}?${this.clientParams()}`);
    await this.throwIfError(response);
    return decode(pushSubscriptionSchema.array(), await response.json(), 'Strava push subscriptions');
  }

  /**
   * Registering a callback makes Strava send the hub.challenge handshake to it
   * before this call returns.
   */
  async createSubscription(callbackUrl: string, verifyToken: string): Promise<number> {
    const response = await this.fetchFn(this.subscriptionsUrl(), {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        client_id: this.options.clientId,
        client_secret: this.options.clientSecret,
        callback_url: callbackUrl,
        verify_token: verifyToken
      })
    });
    await this.throwIfError(response);

    const created = decode(pushSubscriptionSchema.pick({ id: true }), await response.json(), 'Strava push subscription');
    return created.id;
  }

  async deleteSubscription(subscriptionId: number): Promise<void> {
    const response = await this.fetchFn(`${this.subscriptionsUrl()}/${subscriptionId}?${this.clientParams()}`, {
      method: 'DELETE'
    });
    await this.throwIfError(response);
  }

  private async getJson(path: string, accessToken: string): Promise<unknown> {
    const response = await this.fetchFn(`${this.options.apiBaseUrl}${path}`, {
      headers: { Authorization: `Bearer ${accessToken}` }
    });
    await this.throwIfError(response);
    return response.json();
  }

  private async throwIfError(response: Response): Promise<void> {
    const error = await parseErrorResponse(response);
    if (error) throw error;
  }

  private subscriptionsUrl(): string {
    return `${this.options.apiBaseUrl}/push_subscriptions`;
  }

  private clientParams(): string {
    return new URLSearchParams({
      client_id: this.options.clientId,
      client_secret: this.options.clientSecret
    }).toString();
  }
}
