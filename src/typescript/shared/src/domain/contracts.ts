import { AthleteCredential, DeliveryRecord, DisplayMessage } from '../types/relay';
import { StravaActivity, StravaAthlete, StravaTokenResponse } from '../types/strava';

// Seams between the relay and its collaborators. Production implementations
// live in storage/ and integrations/; tests substitute in-memory fakes.

export interface CredentialStore {
  get(athleteId: number): Promise<AthleteCredential | null>;
  put(credential: AthleteCredential): Promise<void>;
}

export interface DeliveryStore {
  get(activityId: number): Promise<DeliveryRecord | null>;
  put(record: DeliveryRecord): Promise<void>;
}

export interface ActivityProvider {
  getActivity(activityId: number, accessToken: string): Promise<StravaActivity>;
  getAthlete(accessToken: string): Promise<StravaAthlete>;
}

export type RefreshOutcome =
  | { ok: true; token: StravaTokenResponse }
  | { ok: false; status: number; body: string };

export interface TokenRefresher {
  refresh(refreshToken: string): Promise<RefreshOutcome>;
}

export interface ChatDestination {
  /** Posts a new message and returns the id the destination assigned to it. */
  send(message: DisplayMessage): Promise<string>;
  edit(messageId: string, message: DisplayMessage): Promise<void>;
}

export interface EventPublisher<T> {
  /** @returns The transport's message ID */
  publish(data: T, subject?: string): Promise<string>;
}
