jest.mock('@activity-relay/shared/infrastructure/sentry', () => ({
  captureException: jest.fn()
}));

import { handleStravaEvent } from './intake';
import { DecodeError } from '@activity-relay/shared/framework/errors';
import { captureException } from '@activity-relay/shared/infrastructure/sentry';
import { mockContext, mockFrameworkResponse } from '@activity-relay/shared/test-utils';

const request = (body: unknown) => ({ method: 'POST', query: {}, headers: {}, body });

describe('handleStravaEvent', () => {
  const publish = jest.fn();

  const activityEvent = {
    aspect_type: 'create',
    event_time: 1714548600,
    object_id: 1001,
    object_type: 'activity',
    owner_id: 42,
    subscription_id: 120475,
    updates: {}
  };

  beforeEach(() => {
    jest.clearAllMocks();
    publish.mockResolvedValue('message-1');
  });

  it('should publish an activity event exactly once, unmodified', async () => {
    const res = mockFrameworkResponse();
    const ctx = mockContext({ activityPublisher: { publish } });

    await handleStravaEvent(request(activityEvent), res, ctx);

    expect(publish).toHaveBeenCalledTimes(1);
    expect(publish).toHaveBeenCalledWith(activityEvent, '1001');
    expect(publish.mock.calls[0][0]).toBe(activityEvent);
    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.send).toHaveBeenCalledWith('Success');
  });

  it('should parse a JSON string body', async () => {
    const res = mockFrameworkResponse();

    await handleStravaEvent(request(JSON.stringify(activityEvent)), res, mockContext({ activityPublisher: { publish } }));

    expect(publish).toHaveBeenCalledWith(activityEvent, '1001');
    expect(res.send).toHaveBeenCalledWith('Success');
  });

  it('should not publish athlete events', async () => {
    const res = mockFrameworkResponse();
    const athleteEvent = { ...activityEvent, object_type: 'athlete', object_id: 42, aspect_type: 'update', updates: { authorized: 'false' } };

    await handleStravaEvent(request(athleteEvent), res, mockContext({ activityPublisher: { publish } }));

    expect(publish).not.toHaveBeenCalled();
    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.send).toHaveBeenCalledWith('Success');
  });

  it('should answer 200 and report when publishing fails', async () => {
    const error = new Error('Pub/Sub unavailable');
    publish.mockRejectedValue(error);
    const res = mockFrameworkResponse();
    const ctx = mockContext({ activityPublisher: { publish } });

    await handleStravaEvent(request(activityEvent), res, ctx);

    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.send).toHaveBeenCalledWith('Success');
    expect(ctx.logger.error).toHaveBeenCalledWith('Failed to forward Strava activity event', { objectId: 1001, error });
    expect(captureException).toHaveBeenCalledWith(error, { execution_id: 'test-execution', object_id: 1001 }, ctx.logger);
  });

  it('should reject a body without object_type', async () => {
    const res = mockFrameworkResponse();

    await expect(handleStravaEvent(request({ object_id: 1 }), res, mockContext({ activityPublisher: { publish } })))
      .rejects.toBeInstanceOf(DecodeError);
    expect(publish).not.toHaveBeenCalled();
    expect(res.send).not.toHaveBeenCalled();
  });

  it('should reject a body that is not JSON', async () => {
    await expect(handleStravaEvent(request('{not json'), mockFrameworkResponse(), mockContext({ activityPublisher: { publish } })))
      .rejects.toThrow(/^Invalid Strava webhook event: /);
  });
});
