import * as admin from 'firebase-admin';
import * as converters from './converters';
import { DeliveryRecord } from '../../types/relay';
import { DeliveryStore } from '../../domain/contracts';

/**
 * MessageStore maps a Strava activity id to the Discord message posted for it.
 * The activity id is the document id, so there is never more than one record per activity.
 */
export class MessageStore implements DeliveryStore {
  constructor(
    private db: admin.firestore.Firestore,
    private collectionName: string
  ) { }

  private collection() {
    return this.db.collection(this.collectionName).withConverter(converters.deliveryRecordConverter);
  }

  async get(activityId: number): Promise<DeliveryRecord | null> {
    const doc = await this.collection().doc(String(activityId)).get();
    return doc.exists ? doc.data() || null : null;
  }

  async put(record: DeliveryRecord): Promise<void> {
    await this.collection().doc(String(record.activityId)).set(record);
  }
}
