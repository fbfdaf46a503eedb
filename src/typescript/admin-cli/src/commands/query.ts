import { Command } from 'commander';
import { CliContext } from '../context';
import { parseTenantId } from './arguments';

export function addQueryCommands(program: Command, cli: CliContext) {
  program.command('query:run <tenantId> <sql> [params...]')
    .description('Run a candidate query through the gateway as the given tenant')
    .action(async (tenantIdArg: string, sql: string, params: string[]) => {
      try {
        const tenantId = parseTenantId(tenantIdArg);
        const result = await cli.runtime().services.gateway.run({ sql, tenantId, params });
        console.log(JSON.stringify(result, null, 2));
        if (!result.success) {
          process.exitCode = 1;
        }
      } catch (error) {
        console.error('Query failed:', error);
        process.exitCode = 1;
      }
    });
}
