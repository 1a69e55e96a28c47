import type { FrameworkHandler } from '@activity-relay/shared/framework';
import { decode } from '@activity-relay/shared/types/decode';
import { stravaWebhookEventSchema } from '@activity-relay/shared/types/strava';
import { extractEvent } from './envelope';

/**
 * Posts or edits the Discord message for one forwarded Strava event.
 */
export const handleActivityEvent: FrameworkHandler = async (req, res, { logger, services }) => {
  const event = decode(stravaWebhookEventSchema, extractEvent(req.body, logger), 'Strava webhook event');

  const result = await services.processor.process(event);

  if (result.status === 'Failed') {
    logger.warn('Activity event not processed', { objectId: event.object_id, ...result });
    res.status(result.statusCode).json(result);
    return;
  }

  logger.info('Activity event processed', { objectId: event.object_id, action: result.action });
  res.status(200).json(result);
};
