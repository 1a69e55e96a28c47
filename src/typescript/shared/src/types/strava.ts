import { z } from 'zod';

/**
 * Strava Webhook Event payload structure
 * https://developers.strava.com/docs/webhooks/
 */
export const stravaWebhookEventSchema = z.object({
  object_type: z.enum(['activity', 'athlete']),
  object_id: z.number().int(),
  aspect_type: z.enum(['create', 'update', 'delete']),
  owner_id: z.number().int(),
  subscription_id: z.number().int().optional(),
  event_time: z.number().int().optional(),
  updates: z.record(z.unknown()).optional()
});

export type StravaWebhookEvent = z.infer<typeof stravaWebhookEventSchema>;
export type ObjectType = StravaWebhookEvent['object_type'];
export type AspectType = StravaWebhookEvent['aspect_type'];

/**
 * The intake only routes on object_type and forwards everything else untouched,
 * so it accepts any object type string.
 */
export const webhookEnvelopeSchema = z.object({
  object_type: z.string(),
  object_id: z.union([z.number(), z.string()]).optional()
}).passthrough();

export type WebhookEnvelope = z.infer<typeof webhookEnvelopeSchema>;

/** The DetailedActivity fields the formatter reads. */
export const stravaActivitySchema = z.object({
  id: z.number().int(),
  name: z.string(),
  type: z.string(),
  start_date: z.string(),
  distance: z.number(),
  moving_time: z.number().int(),
  average_speed: z.number(),
  total_elevation_gain: z.number()
});

export type StravaActivity = z.infer<typeof stravaActivitySchema>;

export const stravaAthleteSchema = z.object({
  id: z.number().int(),
  firstname: z.string(),
  lastname: z.string(),
  profile_medium: z.string()
});

export type StravaAthlete = z.infer<typeof stravaAthleteSchema>;

export const stravaTokenResponseSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string(),
  expires_at: z.number().int()
});

export type StravaTokenResponse = z.infer<typeof stravaTokenResponseSchema>;

export const pushSubscriptionSchema = z.object({
  id: z.number().int(),
  callback_url: z.string(),
  created_at: z.string().optional(),
  updated_at: z.string().optional()
});

export type PushSubscription = z.infer<typeof pushSubscriptionSchema>;
