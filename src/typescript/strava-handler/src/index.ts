import { createCloudFunction, FrameworkHandler } from '@activity-relay/shared/framework';
import { handleSubscriptionValidation } from './validator';
import { handleStravaEvent } from './intake';

export const stravaSubscriptionHandler = createCloudFunction(handleSubscriptionValidation, {
  component: 'strava-validator'
});

export const stravaEventHandler = createCloudFunction(handleStravaEvent, {
  component: 'strava-intake'
});

// Strava calls one callback URL for both the handshake (GET) and events (POST)
const routeWebhook: FrameworkHandler = (req, res, ctx) =>
  req.method === 'GET'
    ? handleSubscriptionValidation(req, res, ctx)
    : handleStravaEvent(req, res, ctx);

export const stravaWebhookHandler = createCloudFunction(routeWebhook, {
  component: 'strava-webhook'
});
