/**
 * CLI adapter: parse arguments → load configuration → run demos.
 *
 * Usage:
 *   delegates-and-events [--demo <name>...] [--log-level <level>]
 *
 * @module interfaces/cli/run
 */

import yargs from 'yargs';
import { AppConfigService } from '@/infrastructure/config/AppConfig';
import { ConsoleLogger } from '@/infrastructure/logger/ConsoleLogger';
import type { IOutput } from '@/infrastructure/interfaces/IOutput';
import type { EnvironmentSource } from '@/infrastructure/repositories/EnvConfigRepository';
import { DemoRunner } from '@/application/services/DemoRunner';
import {
  DEMO_NAMES,
  LOG_LEVELS,
  isDemoName,
  isLogLevel,
  type DemoName,
  type LogLevel,
} from '@/shared/types/ConfigTypes';
import { createContainer } from './container';

export interface CliArguments {
  /** Demos requested on the command line; configured list when absent */
  demos?: DemoName[];
  /** Log level override */
  logLevel?: LogLevel;
}

/**
 * Runs the CLI.
 *
 * @returns Process exit code: 0 on success, 1 on any failure
 */
export async function runCli(opts: {
  argv: string[];
  env: EnvironmentSource;
  output?: IOutput;
}): Promise<number> {
  const app = createContainer({ env: opts.env, output: opts.output });
  const logger = app.resolve(ConsoleLogger);

  const parser = yargs(opts.argv)
    .scriptName('delegates-and-events')
    .command(
      '$0',
      'Run the delegate and event demonstrations',
      (y) =>
        y
          .option('demo', {
            type: 'string',
            array: true,
            choices: DEMO_NAMES,
            describe: 'Demo to run (repeatable); defaults to DELEGATES_DEMOS or all demos',
          })
          .option('log-level', {
            type: 'string',
            choices: LOG_LEVELS,
            describe: 'Minimum log level; defaults to DELEGATES_LOG_LEVEL or warn',
          }),
      async (args) => {
        await runDemos(app.resolve<AppConfigService>('AppConfigService'), logger, app.resolve(DemoRunner), {
          demos: args.demo?.map(String).filter(isDemoName),
          logLevel: toLogLevel(args['log-level']),
        });
      }
    )
    .strict()
    .help()
    .exitProcess(false)
    .fail((message, error) => {
      throw error ?? new Error(message);
    });

  try {
    await parser.parseAsync();
    return 0;
  } catch (error) {
    logger.error('Demo run failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    return 1;
  }
}

async function runDemos(
  configService: AppConfigService,
  logger: ConsoleLogger,
  runner: DemoRunner,
  args: CliArguments
): Promise<void> {
  const config = await configService.getAppConfig();
  logger.setLevel(args.logLevel ?? config.logLevel);

  const demos = args.demos && args.demos.length > 0 ? args.demos : config.demos;
  logger.info('Running demos', { demos });
  runner.runAll(demos);
}

function toLogLevel(value: unknown): LogLevel | undefined {
  if (value === undefined) {
    return undefined;
  }
  const level = String(value);
  return isLogLevel(level) ? level : undefined;
}
