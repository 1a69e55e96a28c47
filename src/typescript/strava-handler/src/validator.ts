import type { FrameworkHandler } from '@activity-relay/shared/framework';

/**
 * Answers Strava's subscription handshake by echoing hub.challenge.
 * hub.verify_token is not checked.
 * https://developers.strava.com/docs/webhooks/#subscription-validation-request
 */
export const handleSubscriptionValidation: FrameworkHandler = async (req, res, { logger }) => {
  const challenge = req.query['hub.challenge'];

  if (typeof challenge !== 'string' || challenge === '') {
    logger.warn('Subscription validation request without hub.challenge', { query: req.query });
    res.status(400).send('Invalid request');
    return;
  }

  logger.info('Validated Strava subscription request');
  res.status(200).json({ 'hub.challenge': challenge });
};
