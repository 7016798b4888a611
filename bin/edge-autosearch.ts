#!/usr/bin/env node
import 'dotenv/config';
import path from 'node:path';
import { Command, Option } from 'commander';
import chalk from 'chalk';
import { CdpSessionLauncher } from '../src/browser/cdpSession.js';
import { CancelToken } from '../src/cancel.js';
import { applyHelpStyling } from '../src/cli/help.js';
import {
  parseDurationOption,
  parsePolicyOption,
  parsePositiveIntOption,
  type CliOptions,
} from '../src/cli/options.js';
import { createInquirerPrompter } from '../src/cli/prompts.js';
import { buildSearchConfig, EXIT_CODES, reportFatalError, runSearchCommand } from '../src/cli/run.js';
import { loadUserConfig } from '../src/config.js';
import { isErrorLogged } from '../src/errors.js';
import { createConsoleSink, createFileSink, createLogger, type LogSink, type SearchLogger } from '../src/logger.js';
import { createProcessTerminator, detectLockInspector } from '../src/profiles/processes.js';
import { createDirectoryRevealer } from '../src/profiles/reveal.js';
import { getSearcherHomeDir } from '../src/searcherHome.js';
import { getCliVersion } from '../src/version.js';

const VERSION = getCliVersion();
const LOG_FILENAME = 'edge-autosearch.log';

const program = new Command();
program
  .name('edge-autosearch')
  .description('Run randomized, human-paced Bing searches inside a copy of a Microsoft Edge profile.')
  .version(VERSION)
  .option('--profile <index>', 'Profile number from the list (1-based).')
  .option('-n, --count <n>', 'Number of searches to run.', parsePositiveIntOption)
  .option('--policy <operator|automatic>', 'How the working copy of the profile is made.', parsePolicyOption)
  .option('--queries <file>', 'Query list, one per line (default ./queries.txt, then the bundled list).')
  .option('--profile-root <dir>', 'Edge "User Data" directory (default: the platform location).')
  .option('--edge-path <file>', 'Edge executable (default: EDGE_PATH or the installed Edge).')
  .option('--headless', 'Run Edge without a window.')
  .option('--max-attempts <n>', 'Browser launches allowed when the session dies.', parsePositiveIntOption)
  .option('--wait-for-login', 'Open Bing first and wait for you to sign in.')
  .option('--login-timeout <duration>', 'How long --wait-for-login waits (e.g. 90s).', parseDurationOption)
  .option('--auto-terminate', 'Close Edge processes that lock profile files (automatic policy).')
  .option('--no-auto-terminate', 'Never close Edge processes; always ask instead.')
  .option('--keep-working-copy', 'Keep the temporary profile copy after the run.')
  .option('--log-file <file>', `Append the log here (default ~/.edge-autosearch/${LOG_FILENAME}).`)
  .addOption(new Option('-v, --verbose', 'Enable verbose logging.').default(false));

applyHelpStyling(program, VERSION, Boolean(process.stdout.isTTY));

function buildLogger(verbose: boolean, logFile: string | null): SearchLogger {
  const sinks: LogSink[] = [createConsoleSink()];
  if (logFile) {
    sinks.push(createFileSink(logFile));
  }
  return createLogger({ sinks, verbose });
}

async function runCli(options: CliOptions): Promise<number> {
  const verbose = Boolean(options.verbose);
  const token = new CancelToken();
  const onSigint = () => {
    if (token.isCancelled) {
      // Second Ctrl+C: stop waiting for cleanup.
      process.exit(EXIT_CODES.cancelled);
    }
    console.log(chalk.yellow('\nCancelling... (press Ctrl+C again to force quit)'));
    token.cancel('Interrupted by Ctrl+C');
  };
  process.on('SIGINT', onSigint);

  let logger = buildLogger(verbose, null);
  try {
    const { config: userConfig, path: configFile, loaded } = await loadUserConfig();
    const config = buildSearchConfig(userConfig, options);
    logger = buildLogger(verbose, path.resolve(config.logFile ?? path.join(getSearcherHomeDir(), LOG_FILENAME)));
    logger.debug(loaded ? `Loaded config from ${configFile}` : `No config file at ${configFile}; using defaults`);

    const lockInspector = await detectLockInspector({ executable: config.lockInspectorPath });
    if (!lockInspector) {
      logger.debug('No lock-inspection tool on PATH; locked files will be reported to you instead.');
    }
    const result = await runSearchCommand(options, userConfig, {
      logger,
      prompter: createInquirerPrompter(token),
      token,
      launcher: new CdpSessionLauncher(logger),
      lockInspector,
      terminator: createProcessTerminator(),
      revealDirectory: createDirectoryRevealer(logger),
    });
    return result.exitCode;
  } catch (error) {
    return reportFatalError(error, logger);
  } finally {
    process.off('SIGINT', onSigint);
    await logger.close();
  }
}

program.action(async function (this: Command) {
  const options = this.opts<CliOptions>();
  process.exitCode = await runCli(options);
});

async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

void main().catch((error: unknown) => {
  if (error instanceof Error) {
    if (!isErrorLogged(error)) {
      console.error(chalk.red('✖'), error.message);
    }
  } else {
    console.error(chalk.red('✖'), error);
  }
  process.exitCode = 1;
});
