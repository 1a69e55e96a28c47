import { Command } from 'commander';
import { AdminContext } from '../context';
import { parseId, withErrors } from './helpers';

export const addSubscriptionCommands = (program: Command, getContext: () => AdminContext) => {
  program.command('subscriptions:list')
    .description('List the Strava push subscriptions of the configured app')
    .action(() => withErrors(async () => {
      const subscriptions = await getContext().strava.listSubscriptions();

      if (subscriptions.length === 0) {
        console.log('No push subscriptions found.');
        return;
      }

      console.log(`Found ${subscriptions.length} push subscription(s):`);
      subscriptions.forEach(sub => {
        console.log(`[${sub.id}] ${sub.callback_url}${sub.created_at ? ` (created ${sub.created_at})` : ''}`);
      });
    }));

  // Strava allows one subscription per app and calls the callback with
  // hub.challenge before answering
  program.command('subscriptions:create')
    .description('Register the webhook callback with Strava')
    .requiredOption('--callback-url <url>', 'Public URL of stravaWebhookHandler')
    .requiredOption('--verify-token <token>', 'Token Strava echoes in the validation request')
    .action((options: { callbackUrl: string; verifyToken: string }) => withErrors(async () => {
      console.log(`Registering ${options.callbackUrl}...`);
      const id = await getContext().strava.createSubscription(options.callbackUrl, options.verifyToken);
      console.log(`✅ Created push subscription ${id}`);
    }));

  program.command('subscriptions:delete')
    .description('Delete a Strava push subscription')
    .argument('<subscriptionId>', 'Subscription ID', parseId)
    .action((subscriptionId: number) => withErrors(async () => {
      await getContext().strava.deleteSubscription(subscriptionId);
      console.log(`✅ Deleted push subscription ${subscriptionId}`);
    }));
};
