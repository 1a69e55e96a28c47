import type { FrameworkHandler } from '@activity-relay/shared/framework';
import { DecodeError } from '@activity-relay/shared/framework/errors';
import { captureException } from '@activity-relay/shared/infrastructure/sentry';
import { decode } from '@activity-relay/shared/types/decode';
import { webhookEnvelopeSchema } from '@activity-relay/shared/types/strava';

const EVENT = 'Strava webhook event';

function parseBody(body: unknown): unknown {
  if (typeof body !== 'string') return body;

  try {
    return JSON.parse(body);
  } catch (error) {
    throw new DecodeError(EVENT, [{ path: '', message: error instanceof Error ? error.message : String(error) }]);
  }
}

/**
 * Receives Strava event notifications and forwards activity events to the
 * activity topic. Strava retries anything but a quick 200, so publish failures
 * are logged and reported, never returned.
 */
export const handleStravaEvent: FrameworkHandler = async (req, res, ctx) => {
  const { logger, services } = ctx;

  const payload = parseBody(req.body);
  const event = decode(webhookEnvelopeSchema, payload, EVENT);

  if (event.object_type === 'activity') {
    const subject = event.object_id === undefined ? undefined : String(event.object_id);
    try {
      const messageId = await services.activityPublisher.publish(payload, subject);
      logger.info('Forwarded Strava activity event', { objectId: event.object_id, messageId });
    } catch (error) {
      logger.error('Failed to forward Strava activity event', { objectId: event.object_id, error });
      captureException(error, { execution_id: ctx.executionId, object_id: event.object_id }, logger);
    }
  } else {
    logger.info('Ignoring Strava event', { objectType: event.object_type });
  }

  res.status(200).send('Success');
};
