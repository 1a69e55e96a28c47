import { loadAdminConfig } from '@activity-relay/shared/config';
import { CredentialStore, DeliveryStore } from '@activity-relay/shared/domain/contracts';
import { createLogger } from '@activity-relay/shared/framework/logger';
import { StravaClient } from '@activity-relay/shared/integrations/strava/client';
import { AthleteStore, MessageStore } from '@activity-relay/shared/storage/firestore';
import { getAdminDb } from './firebase';

export type SubscriptionClient = Pick<StravaClient, 'listSubscriptions' | 'createSubscription' | 'deleteSubscription'>;

export interface AdminContext {
  strava: SubscriptionClient;
  athletes: CredentialStore;
  messages: DeliveryStore;
}

export function createAdminContext(): AdminContext {
  const config = loadAdminConfig();
  const logger = createLogger({ level: config.logging.level, serviceName: 'relay-admin' });
  const db = getAdminDb();

  return {
    strava: new StravaClient(config.strava, logger),
    athletes: new AthleteStore(db, config.firestore.usersCollection),
    messages: new MessageStore(db, config.firestore.messagesCollection)
  };
}
