import { Command } from 'commander';
import { applySchema, databaseRole } from '@trailquery/shared';
import { CliContext } from '../context';

export function addDatabaseCommands(program: Command, cli: CliContext) {
  program.command('db:migrate')
    .description('Create the tables and the row-level security policy, and grant the gateway role read access')
    .action(async () => {
      try {
        const { config, pool } = cli.runtime();
        const gatewayRole = databaseRole(config.database.gatewayUrl);
        await applySchema(pool, { gatewayRole });
        console.log(`✅ Schema applied; ${gatewayRole} can read activities`);
      } catch (error) {
        console.error('Failed to apply schema:', error);
        process.exitCode = 1;
      }
    });
}
