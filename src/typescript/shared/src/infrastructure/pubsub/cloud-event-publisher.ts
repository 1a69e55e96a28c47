import { PubSub, Topic } from '@google-cloud/pubsub';
import type { Logger } from 'winston';
import { CloudEvent } from 'cloudevents';
import { z } from 'zod';
import { EventPublisher } from '../../domain/contracts';

const cloudEventEnvelopeSchema = z.object({
  specversion: z.string(),
  data: z.unknown()
});

export class CloudEventPublisher<T> implements EventPublisher<T> {
  private topic: Topic;

  constructor(
    pubsub: PubSub,
    private topicName: string,
    private source: string, // CloudEvent 'source' (URI-reference)
    private type: string,   // CloudEvent 'type' (com.example.object.action)
    private logger?: Logger
  ) {
    this.topic = pubsub.topic(this.topicName);
  }

  /**
   * Publishes a message wrapped in a CloudEvent envelope.
   * @param data The payload, carried unchanged as the event's data
   * @param subject Optional subject (e.g. resource ID)
   * @returns The Pub/Sub message ID
   */
  async publish(data: T, subject?: string): Promise<string> {
    const ce = new CloudEvent({
      type: this.type,
      source: this.source,
      subject,
      data,
      datacontenttype: 'application/json',
    });

    try {
      // The whole event is the message data
      const messageBuffer = Buffer.from(JSON.stringify(ce));

      const messageId = await this.topic.publishMessage({ data: messageBuffer });

      this.logger?.debug(`Published CloudEvent to ${this.topicName}`, {
        messageId,
        ceType: this.type,
        ceSource: this.source,
        ceId: ce.id
      });

      return messageId;
    } catch (error) {
      this.logger?.error(`Failed to publish CloudEvent to ${this.topicName}`, { error });
      throw error;
    }
  }

  /**
   * Unwraps the data of a CloudEvent written by publish().
   *
   * @param raw The Pub/Sub message data: base64 or JSON text, a Buffer, or an
   *   already-parsed event
   * @returns The event's data, or null when the input is not a CloudEvent
   */
  static unwrap(raw: unknown, logger?: Pick<Logger, 'warn'>): unknown {
    if (raw === undefined || raw === null || raw === '') return null;

    try {
      let parsed: unknown = raw;

      if (typeof raw === 'string' || Buffer.isBuffer(raw)) {
        let jsonString = Buffer.isBuffer(raw) ? raw.toString('utf-8') : raw;
        // Push deliveries carry the data base64-encoded
        if (!jsonString.trim().startsWith('{')) {
          jsonString = Buffer.from(jsonString, 'base64').toString('utf-8');
        }
        parsed = JSON.parse(jsonString);
      }

      const envelope = cloudEventEnvelopeSchema.safeParse(parsed);
      if (!envelope.success || envelope.data.data === undefined) {
        logger?.warn('Message is not a CloudEvent');
        return null;
      }
      return envelope.data.data;
    } catch (error) {
      logger?.warn('Failed to unwrap CloudEvent', { error });
      return null;
    }
  }
}
