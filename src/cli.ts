#!/usr/bin/env node
import { Command } from 'commander';
import { createConnection } from 'vscode-languageserver/node';
import { ActivityTracker } from './activity-tracker';
import { createNodeAdapter } from './adapter';
import { Dependencies } from './dependencies';
import { logger } from './logger';
import { registerHandlers } from './server';
import { NAME, VERSION } from './version';

interface CliOptions {
  wakatimeCli?: string;
  stdio?: boolean;
}

export const program = new Command()
  .name(NAME)
  .version(VERSION)
  .description('A simple WakaTime language server')
  .option('-p, --wakatime-cli <path>', 'wakatime-cli path')
  .option('--stdio', 'talk LSP over stdin/stdout (the default)')
  .action(async (opts: CliOptions) => {
    const adapter = createNodeAdapter();
    const dependencies = new Dependencies(logger, adapter, opts.wakatimeCli);
    const tracker = new ActivityTracker({ adapter, dependencies, logger });
    await tracker.initialize();

    const connection = createConnection(process.stdin, process.stdout);
    registerHandlers(connection, tracker, logger);
    connection.listen();
  });

if (require.main === module) {
  program.parseAsync(process.argv).catch((error: unknown) => {
    logger.error(`Failed to start: ${error}`);
    process.exitCode = 1;
  });
}
