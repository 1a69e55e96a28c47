import type { Logger } from 'winston';
import { ActivityProvider } from '../contracts';
import { buildDisplayMessage } from '../formatting';
import { DeliveryTracker } from './delivery-tracker';
import { TokenSource } from '../../infrastructure/oauth/token-source';
import { DisplayMessage, ProcessResult } from '../../types/relay';
import { AspectType, StravaWebhookEvent } from '../../types/strava';

/**
 * ActivityEventProcessor turns one Strava webhook event into a Discord post or edit.
 */
export class ActivityEventProcessor {
  constructor(
    private tokens: TokenSource,
    private strava: ActivityProvider,
    private tracker: DeliveryTracker,
    private logger: Logger
  ) { }

  async process(event: StravaWebhookEvent): Promise<ProcessResult> {
    const { object_type: objectType, object_id: objectId, aspect_type: aspectType, owner_id: ownerId } = event;
    this.logger.info('Processing Strava event', { objectType, objectId, aspectType, ownerId });

    const token = await this.tokens.getToken(ownerId);
    if (!token.ok) {
      return { status: 'Failed', statusCode: token.statusCode, message: token.message };
    }

    switch (objectType) {
      case 'activity':
        return this.processActivity(aspectType, objectId, token.accessToken);
      case 'athlete':
        // Deauthorization and profile changes carry nothing to post
        this.logger.info('Ignoring athlete event', { objectId, aspectType });
        return { status: 'Success', action: 'ignored' };
    }
  }

  private async processActivity(aspectType: AspectType, activityId: number, accessToken: string): Promise<ProcessResult> {
    switch (aspectType) {
      case 'create': {
        const message = await this.buildMessage(accessToken, activityId);
        await this.tracker.postNew(activityId, message);
        return { status: 'Success', action: 'posted', activityId };
      }
      case 'update': {
        const message = await this.buildMessage(accessToken, activityId);
        const outcome = await this.tracker.postOrEdit(activityId, message);
        return { status: 'Success', action: outcome.action, activityId };
      }
      case 'delete':
        // TODO: decide whether a deleted activity should remove its Discord message and delivery record
        this.logger.info('Ignoring activity delete event', { activityId });
        return { status: 'Success', action: 'ignored', activityId };
    }
  }

  private async buildMessage(accessToken: string, activityId: number): Promise<DisplayMessage> {
    const activity = await this.strava.getActivity(activityId, accessToken);
    const athlete = await this.strava.getAthlete(accessToken);

    this.logger.debug(`Strava activity response for ${activityId}`, { activity });
    return buildDisplayMessage(activity, athlete);
  }
}

