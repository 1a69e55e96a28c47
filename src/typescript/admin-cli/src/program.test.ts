import { buildProgram } from './program';
import { AdminContext } from './context';
import { InMemoryCredentialStore, InMemoryDeliveryStore } from '@activity-relay/shared/test-utils';
import { UpstreamHttpError } from '@activity-relay/shared/infrastructure/http/errors';

describe('relay-admin', () => {
  const listSubscriptions = jest.fn();
  const createSubscription = jest.fn();
  const deleteSubscription = jest.fn();
  let context: AdminContext;
  let createContext: jest.Mock<AdminContext, []>;
  let log: jest.SpyInstance;
  let error: jest.SpyInstance;

  const run = (...args: string[]) => {
    const program = buildProgram(createContext);
    program.exitOverride();
    return program.parseAsync(args, { from: 'user' });
  };

  beforeEach(() => {
    jest.clearAllMocks();
    context = {
      strava: { listSubscriptions, createSubscription, deleteSubscription },
      athletes: new InMemoryCredentialStore([
        { athleteId: 42, accessToken: 'test-access', refreshToken: 'test-refresh', expiresAt: 1714608000 }
      ]),
      messages: new InMemoryDeliveryStore([{ activityId: 1001, messageId: '555' }])
    };
    createContext = jest.fn(() => context);
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
      throw new Error(`process.exit(${code})`);
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('subscriptions', () => {
    it('should list subscriptions', async () => {
      listSubscriptions.mockResolvedValue([
        { id: 120475, callback_url: 'https://relay.example.com/strava', created_at: '2024-05-01T00:00:00Z' }
      ]);

      await run('subscriptions:list');

      expect(log).toHaveBeenCalledWith('Found 1 push subscription(s):');
      expect(log).toHaveBeenCalledWith('[120475] https://relay.example.com/strava (created 2024-05-01T00:00:00Z)');
    });

    it('should say when there are none', async () => {
      listSubscriptions.mockResolvedValue([]);

      await run('subscriptions:list');

      expect(log).toHaveBeenCalledWith('No push subscriptions found.');
    });

    it('should create a subscription', async () => {
      createSubscription.mockResolvedValue(120476);

      await run('subscriptions:create', '--callback-url', 'https://relay.example.com/strava', '--verify-token', 'test-verify');

      expect(createSubscription).toHaveBeenCalledWith('https://relay.example.com/strava', 'test-verify');
      expect(log).toHaveBeenCalledWith('✅ Created push subscription 120476');
    });

    it('should delete a subscription by numeric id', async () => {
      deleteSubscription.mockResolvedValue(undefined);

      await run('subscriptions:delete', '120475');

      expect(deleteSubscription).toHaveBeenCalledWith(120475);
      expect(log).toHaveBeenCalledWith('✅ Deleted push subscription 120475');
    });

    it('should print upstream errors and exit 1', async () => {
      listSubscriptions.mockRejectedValue(new UpstreamHttpError(401, 'Unauthorized', '{"message":"Authorization Error"}'));

      await expect(run('subscriptions:list')).rejects.toThrow('process.exit(1)');
      expect(error).toHaveBeenCalledWith('❌ Unauthorized (401): {"message":"Authorization Error"}');
    });

    it('should reject a non-numeric id before contacting Strava', async () => {
      await expect(run('subscriptions:delete', 'abc')).rejects.toThrow();
      expect(deleteSubscription).not.toHaveBeenCalled();
      expect(createContext).not.toHaveBeenCalled();
    });
  });

  describe('athletes:show', () => {
    it('should show the token expiry without the tokens', async () => {
      await run('athletes:show', '42');

      const output = log.mock.calls.map(call => call[0]);
      expect(output[0]).toBe('Athlete 42');
      expect(output[1]).toMatch(/^ {2}Token expires: 2024-05-02T00:00:00\.000Z \((expired, refreshed on next event|valid)\)$/);
      expect(output.join('\n')).not.toContain('test-access');
    });

    it('should fail for an unknown athlete', async () => {
      await expect(run('athletes:show', '7')).rejects.toThrow('process.exit(1)');
      expect(error).toHaveBeenCalledWith('❌ No stored credentials for athlete 7');
    });
  });

  describe('messages:show', () => {
    it('should show the recorded message id', async () => {
      await run('messages:show', '1001');
      expect(log).toHaveBeenCalledWith('Activity 1001 -> Discord message 555');
    });

    it('should say when nothing was recorded', async () => {
      await run('messages:show', '2002');
      expect(log).toHaveBeenCalledWith('No message recorded for activity 2002; an update will post a new one.');
    });
  });

  it('should build the context once per run', async () => {
    listSubscriptions.mockResolvedValue([]);
    await run('subscriptions:list');
    expect(createContext).toHaveBeenCalledTimes(1);
  });
});
