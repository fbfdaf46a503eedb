import { Command } from 'commander';
import { addActivitiesCommands } from './commands/activities';
import { addDatabaseCommands } from './commands/database';
import { addQueryCommands } from './commands/query';
import { addWebhookCommands } from './commands/webhooks';
import { CliContext } from './context';

export function buildProgram(cli: CliContext): Command {
  const program = new Command();

  program
    .name('trailquery-admin')
    .description('CLI for TrailQuery administration')
    .version('1.0.0');

  addDatabaseCommands(program, cli);
  addWebhookCommands(program, cli);
  addActivitiesCommands(program, cli);
  addQueryCommands(program, cli);

  return program;
}
