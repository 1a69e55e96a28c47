import { FirestoreDataConverter, QueryDocumentSnapshot } from 'firebase-admin/firestore';
import { AthleteCredential, DeliveryRecord } from '../../types/relay';

// Documents keep Strava's snake_case field names so records written by the
// OAuth grant flow and by this relay are interchangeable.

const toNumber = (val: unknown): number => {
  if (typeof val === 'number') return val;
  if (typeof val === 'string' && val.trim() !== '') return Number(val);
  return NaN;
};

export const athleteCredentialConverter: FirestoreDataConverter<AthleteCredential> = {
  toFirestore(model: AthleteCredential): FirebaseFirestore.DocumentData {
    return {
      id: model.athleteId,
      access_token: model.accessToken,
      refresh_token: model.refreshToken,
      expires_at: model.expiresAt
    };
  },
  fromFirestore(snapshot: QueryDocumentSnapshot): AthleteCredential {
    const data = snapshot.data();
    return {
      athleteId: data.id !== undefined ? toNumber(data.id) : toNumber(snapshot.id),
      accessToken: String(data.access_token ?? ''),
      refreshToken: String(data.refresh_token ?? ''),
      expiresAt: toNumber(data.expires_at)
    };
  }
};

export const deliveryRecordConverter: FirestoreDataConverter<DeliveryRecord> = {
  toFirestore(model: DeliveryRecord): FirebaseFirestore.DocumentData {
    return {
      activity_id: model.activityId,
      message_id: model.messageId
    };
  },
  fromFirestore(snapshot: QueryDocumentSnapshot): DeliveryRecord {
    const data = snapshot.data();
    return {
      activityId: data.activity_id !== undefined ? toNumber(data.activity_id) : toNumber(snapshot.id),
      messageId: String(data.message_id ?? '')
    };
  }
};
