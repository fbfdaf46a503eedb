import { Command } from 'commander';
import inquirer from 'inquirer';
import { CliContext } from '../context';

export function addWebhookCommands(program: Command, cli: CliContext) {
  program.command('webhook:register <callbackUrl>')
    .description('Create the push subscription; the callback must answer the verification handshake')
    .action(async (callbackUrl: string) => {
      try {
        const subscriptions = cli.subscriptions();

        // The provider allows one subscription per application
        const existing = await subscriptions.list();
        if (existing.length > 0) {
          console.log(`⚠️  Found ${existing.length} existing subscription(s):`);
          existing.forEach(sub => {
            console.log(`   - ID: ${sub.id}, URL: ${sub.callbackUrl}`);
          });
          console.log('Delete it first with webhook:delete <id>');
          return;
        }

        const verifyToken = cli.runtime().config.secrets.get('STRAVA_VERIFY_TOKEN');
        const id = await subscriptions.create(callbackUrl, verifyToken);
        console.log(`✅ Subscription created: ${id}`);
        console.log('Set STRAVA_SUBSCRIPTION_ID to this id to refuse events for any other subscription.');
      } catch (error) {
        console.error('Failed to register webhook:', error);
        process.exitCode = 1;
      }
    });

  program.command('webhook:list')
    .description('List push subscriptions')
    .action(async () => {
      try {
        const existing = await cli.subscriptions().list();
        if (existing.length === 0) {
          console.log('No subscriptions found.');
          return;
        }
        existing.forEach(sub => {
          console.log(`${sub.id}\t${sub.callbackUrl}${sub.createdAt ? `\t${sub.createdAt}` : ''}`);
        });
      } catch (error) {
        console.error('Failed to list webhooks:', error);
        process.exitCode = 1;
      }
    });

  program.command('webhook:delete <subscriptionId>')
    .description('Delete a push subscription')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .action(async (subscriptionId: string, options: { yes?: boolean }) => {
      try {
        const id = Number(subscriptionId);
        if (!Number.isSafeInteger(id) || id <= 0) {
          console.error(`Invalid subscription id: ${subscriptionId}`);
          process.exitCode = 1;
          return;
        }

        if (!options.yes) {
          const answers = await inquirer.prompt<{ confirmed: boolean }>([
            {
              type: 'confirm',
              name: 'confirmed',
              message: `Delete subscription ${id}? Events stop until a new one is registered.`,
              default: false,
            },
          ]);
          if (!answers.confirmed) {
            console.log('Aborted.');
            return;
          }
        }

        await cli.subscriptions().delete(id);
        console.log(`✅ Subscription ${id} deleted`);
      } catch (error) {
        console.error('Failed to delete webhook:', error);
        process.exitCode = 1;
      }
    });
}
