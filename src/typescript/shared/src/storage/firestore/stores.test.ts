import * as admin from 'firebase-admin';
import { QueryDocumentSnapshot } from 'firebase-admin/firestore';
import { AthleteStore } from './athlete-store';
import { MessageStore } from './message-store';
import { athleteCredentialConverter, deliveryRecordConverter } from './converters';

const mockSet = jest.fn();
const mockGet = jest.fn();
const mockDoc = jest.fn(() => ({ get: mockGet, set: mockSet }));
const mockWithConverter = jest.fn(() => ({ doc: mockDoc }));
const mockCollection = jest.fn(() => ({ withConverter: mockWithConverter }));

const db = { collection: mockCollection } as unknown as admin.firestore.Firestore;

const snapshot = (id: string, data: Record<string, unknown>) =>
  ({ id, data: () => data }) as unknown as QueryDocumentSnapshot;

describe('Firestore stores', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('AthleteStore', () => {
    it('should read the credential document keyed by athlete id', async () => {
      const credential = { athleteId: 42, accessToken: 'a', refreshToken: 'r', expiresAt: 100 };
      mockGet.mockResolvedValue({ exists: true, data: () => credential });

      const store = new AthleteStore(db, 'users');
      const result = await store.get(42);

      expect(mockCollection).toHaveBeenCalledWith('users');
      expect(mockWithConverter).toHaveBeenCalledWith(athleteCredentialConverter);
      expect(mockDoc).toHaveBeenCalledWith('42');
      expect(result).toEqual(credential);
    });

    it('should return null when the athlete is unknown', async () => {
      mockGet.mockResolvedValue({ exists: false, data: () => undefined });

      const store = new AthleteStore(db, 'users');
      expect(await store.get(7)).toBeNull();
    });

    it('should overwrite the whole document on put', async () => {
      const store = new AthleteStore(db, 'relay-users');
      const credential = { athleteId: 42, accessToken: 'a2', refreshToken: 'r2', expiresAt: 200 };

      await store.put(credential);

      expect(mockCollection).toHaveBeenCalledWith('relay-users');
      expect(mockDoc).toHaveBeenCalledWith('42');
      expect(mockSet).toHaveBeenCalledWith(credential);
    });
  });

  describe('MessageStore', () => {
    it('should key delivery records by activity id', async () => {
      const store = new MessageStore(db, 'messages');
      await store.put({ activityId: 1001, messageId: '9876543210' });

      expect(mockCollection).toHaveBeenCalledWith('messages');
      expect(mockWithConverter).toHaveBeenCalledWith(deliveryRecordConverter);
      expect(mockDoc).toHaveBeenCalledWith('1001');
      expect(mockSet).toHaveBeenCalledWith({ activityId: 1001, messageId: '9876543210' });
    });

    it('should return null when no message was posted', async () => {
      mockGet.mockResolvedValue({ exists: false, data: () => undefined });

      const store = new MessageStore(db, 'messages');
      expect(await store.get(1001)).toBeNull();
    });
  });

  describe('converters', () => {
    it('should map credentials to snake_case fields', () => {
      expect(athleteCredentialConverter.toFirestore({
        athleteId: 42, accessToken: 'a', refreshToken: 'r', expiresAt: 100
      })).toEqual({ id: 42, access_token: 'a', refresh_token: 'r', expires_at: 100 });
    });

    it('should read credentials written with string ids', () => {
      const record = athleteCredentialConverter.fromFirestore(snapshot('42', {
        access_token: 'a', refresh_token: 'r', expires_at: '1700000000'
      }));

      expect(record).toEqual({ athleteId: 42, accessToken: 'a', refreshToken: 'r', expiresAt: 1700000000 });
    });

    it('should round-trip delivery records', () => {
      const data = deliveryRecordConverter.toFirestore({ activityId: 1001, messageId: '555' });
      expect(data).toEqual({ activity_id: 1001, message_id: '555' });
      expect(deliveryRecordConverter.fromFirestore(snapshot('1001', data))).toEqual({ activityId: 1001, messageId: '555' });
    });
  });
});
