import { getSecret } from './infrastructure/secrets/manager';

export const DEFAULTS = {
  ACTIVITY_TOPIC: 'topic-strava-activity',
  USERS_COLLECTION: 'users',
  MESSAGES_COLLECTION: 'messages',
  STRAVA_API_BASE: 'https://www.strava.com/api/v3',
  STRAVA_TOKEN_URL: 'https://www.strava.com/oauth/token',
  LOG_LEVEL: 'info'
};

export interface RelayConfig {
  strava: {
    clientId: string;
    clientSecret: string;
    apiBaseUrl: string;
    tokenUrl: string;
  };
  discord: {
    webhookUrl: string;
  };
  pubsub: {
    activityTopic: string;
  };
  firestore: {
    usersCollection: string;
    messagesCollection: string;
  };
  logging: {
    level: string;
    serviceName: string;
  };
  sentry: {
    dsn?: string;
    environment: string;
    release: string;
  };
}

/**
 * Logging and error reporting settings need no secrets, so the framework reads
 * them before the full configuration is loaded.
 */
export function loadLoggingConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig['logging'] {
  return {
    level: (env.LOG_LEVEL || DEFAULTS.LOG_LEVEL).toLowerCase(),
    serviceName: env.K_SERVICE || 'unknown-service'
  };
}

export function loadStravaConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig['strava'] {
  return {
    clientId: getSecret('STRAVA_CLIENT_ID', env),
    clientSecret: getSecret('STRAVA_CLIENT_SECRET', env),
    apiBaseUrl: env.STRAVA_API_BASE || DEFAULTS.STRAVA_API_BASE,
    tokenUrl: env.STRAVA_TOKEN_URL || DEFAULTS.STRAVA_TOKEN_URL
  };
}

export function loadFirestoreConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig['firestore'] {
  return {
    usersCollection: env.USERS_COLLECTION || DEFAULTS.USERS_COLLECTION,
    messagesCollection: env.MESSAGES_COLLECTION || DEFAULTS.MESSAGES_COLLECTION
  };
}

export function loadSentryConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig['sentry'] {
  return {
    dsn: env.SENTRY_DSN || undefined,
    environment: env.GOOGLE_CLOUD_PROJECT || env.GCP_PROJECT || 'activity-relay-dev',
    release: env.SENTRY_RELEASE || env.K_REVISION || 'unknown'
  };
}

/**
 * Builds the relay configuration from an environment.
 * Called once per process; components receive the result, never the environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  return {
    strava: loadStravaConfig(env),
    discord: {
      webhookUrl: getSecret('DISCORD_WEBHOOK_URL', env)
    },
    pubsub: {
      activityTopic: env.ACTIVITY_TOPIC || DEFAULTS.ACTIVITY_TOPIC
    },
    firestore: loadFirestoreConfig(env),
    logging: loadLoggingConfig(env),
    sentry: loadSentryConfig(env)
  };
}

export type AdminConfig = Pick<RelayConfig, 'strava' | 'firestore' | 'logging'>;

/**
 * Settings for the admin CLI, which talks to Strava and Firestore but never
 * posts to Discord.
 */
export function loadAdminConfig(env: NodeJS.ProcessEnv = process.env): AdminConfig {
  return {
    strava: loadStravaConfig(env),
    firestore: loadFirestoreConfig(env),
    logging: loadLoggingConfig(env)
  };
}
