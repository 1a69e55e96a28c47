jest.mock('@activity-relay/shared/framework', () => ({
  createCloudFunction: (handler: unknown) => handler
}));

import { stravaEventHandler, stravaSubscriptionHandler, stravaWebhookHandler } from './index';
import type { FrameworkHandler } from '@activity-relay/shared/framework';
import { mockContext, mockFrameworkResponse } from '@activity-relay/shared/test-utils';

// createCloudFunction is the identity here, so the exports are the raw handlers
const asHandler = (fn: unknown) => fn as FrameworkHandler;

describe('strava-handler', () => {
  it('should export the three entry points', () => {
    expect(typeof stravaSubscriptionHandler).toBe('function');
    expect(typeof stravaEventHandler).toBe('function');
    expect(typeof stravaWebhookHandler).toBe('function');
  });

  describe('stravaWebhookHandler', () => {
    it('should route GET to the subscription validator', async () => {
      const res = mockFrameworkResponse();

      await asHandler(stravaWebhookHandler)(
        { method: 'GET', query: { 'hub.challenge': 'abc' }, headers: {}, body: undefined },
        res,
        mockContext()
      );

      expect(res.json).toHaveBeenCalledWith({ 'hub.challenge': 'abc' });
    });

    it('should route POST to the event intake', async () => {
      const publish = jest.fn().mockResolvedValue('message-1');
      const res = mockFrameworkResponse();
      const body = { object_type: 'activity', object_id: 7, aspect_type: 'create', owner_id: 42 };

      await asHandler(stravaWebhookHandler)(
        { method: 'POST', query: {}, headers: {}, body },
        res,
        mockContext({ activityPublisher: { publish } })
      );

      expect(publish).toHaveBeenCalledWith(body, '7');
      expect(res.send).toHaveBeenCalledWith('Success');
    });
  });
});
