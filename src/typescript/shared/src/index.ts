export * from './config';
export * from './framework';
export * from './domain/contracts';
export * from './domain/formatting';
export * from './domain/services';
export * from './infrastructure/http';
export * from './infrastructure/oauth';
export { CloudEventPublisher } from './infrastructure/pubsub/cloud-event-publisher';
export { getSecret } from './infrastructure/secrets/manager';
export { initSentry, captureException, flushSentry } from './infrastructure/sentry';
export * from './integrations/discord/client';
export * from './integrations/strava/client';
export * from './storage/firestore';
export * from './types/decode';
export * from './types/relay';
export * from './types/strava';
