import * as admin from 'firebase-admin';
import * as converters from './converters';
import { AthleteCredential } from '../../types/relay';
import { CredentialStore } from '../../domain/contracts';

/**
 * AthleteStore keeps Strava OAuth credentials, one document per athlete id.
 */
export class AthleteStore implements CredentialStore {
  constructor(
    private db: admin.firestore.Firestore,
    private collectionName: string
  ) { }

  private collection() {
    return this.db.collection(this.collectionName).withConverter(converters.athleteCredentialConverter);
  }

  async get(athleteId: number): Promise<AthleteCredential | null> {
    const doc = await this.collection().doc(String(athleteId)).get();
    return doc.exists ? doc.data() || null : null;
  }

  /**
   * Overwrites the whole credential; concurrent writers race, last write wins.
   */
  async put(credential: AthleteCredential): Promise<void> {
    await this.collection().doc(String(credential.athleteId)).set(credential);
  }
}
