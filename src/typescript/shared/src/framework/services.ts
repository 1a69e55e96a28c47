import * as admin from 'firebase-admin';
import { PubSub } from '@google-cloud/pubsub';
import type { Logger } from 'winston';
import { RelayConfig } from '../config';
import { EventPublisher } from '../domain/contracts';
import { DeliveryTracker } from '../domain/services/delivery-tracker';
import { ActivityEventProcessor } from '../domain/services/event-processor';
import { CloudEventPublisher } from '../infrastructure/pubsub/cloud-event-publisher';
import { StravaTokenSource } from '../infrastructure/oauth/token-source';
import { DiscordWebhookClient } from '../integrations/discord/client';
import { StravaClient } from '../integrations/strava/client';
import { AthleteStore, MessageStore } from '../storage/firestore';

export const ACTIVITY_EVENT_TYPE = 'strava.activity.event';
export const ACTIVITY_EVENT_SOURCE = '/strava/webhook';

export interface RelayServices {
  stores: {
    athletes: AthleteStore;
    messages: MessageStore;
  };
  strava: StravaClient;
  activityPublisher: EventPublisher<unknown>;
  processor: ActivityEventProcessor;
}

// Clients are created once per instance and shared across invocations
let db: admin.firestore.Firestore | undefined;
let pubsub: PubSub | undefined;

export function getFirestore(): admin.firestore.Firestore {
  if (!db) {
    // Initialize Firebase (Idempotent)
    if (admin.apps.length === 0) {
      admin.initializeApp();
    }
    db = admin.firestore();
  }
  return db;
}

function getPubSub(): PubSub {
  if (!pubsub) {
    pubsub = new PubSub();
  }
  return pubsub;
}

/**
 * Wires the production collaborators for one invocation.
 */
export function createServices(config: RelayConfig, logger: Logger): RelayServices {
  const firestore = getFirestore();
  const stores = {
    athletes: new AthleteStore(firestore, config.firestore.usersCollection),
    messages: new MessageStore(firestore, config.firestore.messagesCollection)
  };

  const strava = new StravaClient(config.strava, logger);
  const discord = new DiscordWebhookClient(config.discord.webhookUrl, logger);
  const tokens = new StravaTokenSource(stores.athletes, strava, logger);
  const tracker = new DeliveryTracker(discord, stores.messages, logger);

  return {
    stores,
    strava,
    activityPublisher: new CloudEventPublisher<unknown>(
      getPubSub(),
      config.pubsub.activityTopic,
      ACTIVITY_EVENT_SOURCE,
      ACTIVITY_EVENT_TYPE,
      logger
    ),
    processor: new ActivityEventProcessor(tokens, strava, tracker, logger)
  };
}
