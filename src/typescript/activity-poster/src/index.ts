import { createCloudFunction, createEventFunction } from '@activity-relay/shared/framework';
import { handleActivityEvent } from './poster';

// Pub/Sub trigger on the activity topic
export const activityPosterHandler = createEventFunction(handleActivityEvent, {
  component: 'activity-poster'
});

// Direct HTTP delivery, e.g. a push subscription or a manual replay
export const activityPosterHttpHandler = createCloudFunction(handleActivityEvent, {
  component: 'activity-poster'
});
