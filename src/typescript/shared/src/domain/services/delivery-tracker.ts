import type { Logger } from 'winston';
import { ChatDestination, DeliveryStore } from '../contracts';
import { DisplayMessage } from '../../types/relay';

export type DeliveryOutcome =
  | { action: 'posted'; messageId: string }
  | { action: 'edited'; messageId: string };

/**
 * DeliveryTracker decides between posting a new Discord message and editing
 * the one already posted for an activity. A stored record is authoritative;
 * the relay never checks whether the message still exists in Discord.
 */
export class DeliveryTracker {
  constructor(
    private chat: ChatDestination,
    private deliveries: DeliveryStore,
    private logger: Logger
  ) { }

  /**
   * Posts a new message and records its id against the activity,
   * replacing any earlier record for the same activity.
   */
  async postNew(activityId: number, message: DisplayMessage): Promise<DeliveryOutcome> {
    const messageId = await this.chat.send(message);
    await this.deliveries.put({ activityId, messageId });

    this.logger.info('Posted activity message', { activityId, messageId });
    return { action: 'posted', messageId };
  }

  async postOrEdit(activityId: number, message: DisplayMessage): Promise<DeliveryOutcome> {
    const existing = await this.deliveries.get(activityId);

    if (existing) {
      await this.chat.edit(existing.messageId, message);
      this.logger.info('Edited activity message', { activityId, messageId: existing.messageId });
      return { action: 'edited', messageId: existing.messageId };
    }

    this.logger.info('No message recorded for activity, posting a new one', { activityId });
    return this.postNew(activityId, message);
  }
}
