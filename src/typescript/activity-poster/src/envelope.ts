import type { Logger } from 'winston';
import { z } from 'zod';
import { MissingEnvelopeError } from '@activity-relay/shared/framework/errors';
import { CloudEventPublisher } from '@activity-relay/shared/infrastructure/pubsub/cloud-event-publisher';

// https://cloud.google.com/pubsub/docs/push#receive_push
const pubsubMessageSchema = z.object({
  data: z.string(),
  messageId: z.string().optional(),
  attributes: z.record(z.string()).optional()
});

const pushBodySchema = z.union([
  z.object({ message: pubsubMessageSchema }),
  z.object({ messages: z.array(pubsubMessageSchema).min(1) })
]);

export type PubSubMessage = z.infer<typeof pubsubMessageSchema>;

/**
 * Picks the message out of a push body. Batches are not supported: only the
 * first message is kept.
 * @throws MissingEnvelopeError when the body is not a push body
 */
export function firstMessage(body: unknown, logger: Pick<Logger, 'warn'>): PubSubMessage {
  const parsed = pushBodySchema.safeParse(body);
  if (!parsed.success) {
    throw new MissingEnvelopeError();
  }

  if ('message' in parsed.data) {
    return parsed.data.message;
  }

  const [first, ...dropped] = parsed.data.messages;
  if (dropped.length > 0) {
    logger.warn('Received more than one Pub/Sub message, processing only the first', {
      count: parsed.data.messages.length,
      dropped: dropped.map(m => m.messageId)
    });
  }
  return first;
}

/**
 * Returns the Strava event carried by a request body: the CloudEvent data of
 * a Pub/Sub delivery, or the body itself when it was posted directly.
 */
export function extractEvent(body: unknown, logger: Pick<Logger, 'warn'>): unknown {
  try {
    const message = firstMessage(body, logger);
    const data = CloudEventPublisher.unwrap(message.data, logger);
    if (data === null) {
      throw new MissingEnvelopeError('Pub/Sub message carries no CloudEvent data');
    }
    return data;
  } catch (error) {
    if (!(error instanceof MissingEnvelopeError)) throw error;

    logger.warn('No Pub/Sub envelope, reading the body as the event', { reason: error.message });
    return body;
  }
}
