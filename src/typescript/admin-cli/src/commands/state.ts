import { Command } from 'commander';
import { AdminContext } from '../context';
import { parseId, withErrors } from './helpers';

export const addStateCommands = (program: Command, getContext: () => AdminContext, now: () => Date = () => new Date()) => {
  // Tokens are never printed
  program.command('athletes:show')
    .description('Show the stored Strava credential expiry for an athlete')
    .argument('<athleteId>', 'Strava athlete ID', parseId)
    .action((athleteId: number) => withErrors(async () => {
      const credential = await getContext().athletes.get(athleteId);
      if (!credential) {
        throw new Error(`No stored credentials for athlete ${athleteId}`);
      }

      const expiry = new Date(credential.expiresAt * 1000);
      const state = expiry.getTime() <= now().getTime() ? 'expired, refreshed on next event' : 'valid';
      console.log(`Athlete ${athleteId}`);
      console.log(`  Token expires: ${expiry.toISOString()} (${state})`);
    }));

  program.command('messages:show')
    .description('Show the Discord message recorded for an activity')
    .argument('<activityId>', 'Strava activity ID', parseId)
    .action((activityId: number) => withErrors(async () => {
      const record = await getContext().messages.get(activityId);
      if (!record) {
        console.log(`No message recorded for activity ${activityId}; an update will post a new one.`);
        return;
      }
      console.log(`Activity ${activityId} -> Discord message ${record.messageId}`);
    }));
};
