export interface AthleteCredential {
  athleteId: number;
  accessToken: string;
  refreshToken: string;
  /** Epoch seconds, as issued by Strava */
  expiresAt: number;
}

/**
 * Links a Strava activity to the Discord message that shows it.
 */
export interface DeliveryRecord {
  activityId: number;
  messageId: string;
}

export interface DisplayField {
  name: string;
  value: string;
  inline: boolean;
}

export interface DisplayMessage {
  title: string;
  url: string;
  color: number;
  timestamp: Date;
  author: {
    name: string;
    url: string;
    iconUrl: string;
  };
  footer: {
    text: string;
    iconUrl: string;
  };
  fields: DisplayField[];
}

export type TokenResult =
  | { ok: true; accessToken: string }
  | { ok: false; statusCode: number; message: string };

export type ProcessAction = 'posted' | 'edited' | 'ignored';

export type ProcessResult =
  | { status: 'Success'; action: ProcessAction; activityId?: number }
  | { status: 'Failed'; statusCode: number; message: string };
