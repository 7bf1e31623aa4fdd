/**
 * quiz-dispatch CLI
 *
 * Usage:
 * ```bash
 * npm run cli -- route            # one routing pass
 * npm run cli -- serve            # HTTP server (+ cron schedule if enabled)
 * npm run cli -- migrate          # create tables
 * npm run cli -- seed data/questions.example.json
 * ```
 *
 * Configuration comes from environment variables; see `src/config.ts`.
 */

import { Command } from 'commander';
import { config, validateConfig } from '../config';
import { createServices } from '../services';
import { runMigrateCommand } from './commands/migrate';
import { runRouteCommand } from './commands/route';
import { runSeedCommand } from './commands/seed';
import { runServeCommand } from './commands/serve';
import { red } from './utils/terminal';

function createProgram(): Command {
  const program = new Command('quiz-dispatch')
    .description('Adaptive question scheduling and chat-gateway delivery')
    .version('0.1.0');

  program
    .command('route')
    .description('Prepare the next questions for every person and send them')
    .action(async () => {
      validateConfig();
      const services = createServices({ config });
      try {
        await runRouteCommand(services);
      } finally {
        services.close();
      }
    });

  program
    .command('serve')
    .description('Start the webhook/statistics HTTP server')
    .action(() => {
      validateConfig();
      runServeCommand(createServices({ config }));
    });

  program
    .command('migrate')
    .description('Create missing tables and indexes')
    .action(() => {
      runMigrateCommand(config.database.path);
    });

  program
    .command('seed <file>')
    .description('Load questions from a JSON file')
    .action(async (file: string) => {
      await runSeedCommand(config.database.path, file);
    });

  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  });
