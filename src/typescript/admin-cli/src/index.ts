import { createCliContext } from './context';
import { buildProgram } from './program';

async function main() {
  const cli = createCliContext(process.env);
  try {
    await buildProgram(cli).parseAsync();
  } finally {
    await cli.close();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
