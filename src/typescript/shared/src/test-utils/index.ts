import type { Logger } from 'winston';
import type { FrameworkContext } from '../framework';
import type { RelayServices } from '../framework/services';
import { loadConfig } from '../config';
import { AthleteCredential, DeliveryRecord } from '../types/relay';
import { CredentialStore, DeliveryStore } from '../domain/contracts';

export const TEST_ENV = {
  STRAVA_CLIENT_ID: 'test-client-id',
  STRAVA_CLIENT_SECRET: 'test-secret',
  DISCORD_WEBHOOK_URL: 'https://discord.example.com/api/webhooks/1/test-token'
};

/**
 * Minimal stand-in for a fetch Response.
 */
export function mockResponse(status: number, body: unknown = '', statusText = ''): Response {
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  const response = {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    url: '',
    json: async () => JSON.parse(text),
    text: async () => text,
    clone: () => mockResponse(status, body, statusText),
  };
  return response as unknown as Response;
}

export type MockLogger = Logger & {
  info: jest.Mock;
  warn: jest.Mock;
  error: jest.Mock;
  debug: jest.Mock;
};

export function mockLogger(): MockLogger {
  const logger = {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    child: jest.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger as unknown as MockLogger;
}

export class InMemoryCredentialStore implements CredentialStore {
  readonly records = new Map<number, AthleteCredential>();
  readonly puts: AthleteCredential[] = [];

  constructor(initial: AthleteCredential[] = []) {
    initial.forEach(c => this.records.set(c.athleteId, c));
  }

  async get(athleteId: number): Promise<AthleteCredential | null> {
    return this.records.get(athleteId) ?? null;
  }

  async put(credential: AthleteCredential): Promise<void> {
    this.puts.push(credential);
    this.records.set(credential.athleteId, credential);
  }
}

export class InMemoryDeliveryStore implements DeliveryStore {
  readonly records = new Map<number, DeliveryRecord>();
  readonly puts: DeliveryRecord[] = [];

  constructor(initial: DeliveryRecord[] = []) {
    initial.forEach(r => this.records.set(r.activityId, r));
  }

  async get(activityId: number): Promise<DeliveryRecord | null> {
    return this.records.get(activityId) ?? null;
  }

  async put(record: DeliveryRecord): Promise<void> {
    this.puts.push(record);
    this.records.set(record.activityId, record);
  }
}

/**
 * Response double recording what a handler wrote.
 */
export function mockFrameworkResponse() {
  const res = {
    statusCode: 200,
    headersSent: false,
    status: jest.fn(),
    send: jest.fn(),
    json: jest.fn(),
    set: jest.fn()
  };
  res.status.mockImplementation((code: number) => {
    res.statusCode = code;
    return res;
  });
  return res;
}

export function mockContext(services: Partial<RelayServices> = {}, logger: MockLogger = mockLogger()): FrameworkContext & { logger: MockLogger } {
  return {
    config: loadConfig(TEST_ENV),
    services: services as RelayServices,
    logger,
    executionId: 'test-execution'
  };
}
