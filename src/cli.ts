#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 *   pose-dispatch pose <input_dir> [output_dir]
 *   pose-dispatch segments <directory>
 */

import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { buildDispatcher, CommandName, DispatchRequest } from './app';
import { loadEnvConfig } from './config/env';
import { AppError, ConfigurationError, ExternalToolError, getErrorMessage } from './common/errors';
import { LOG_LEVELS, LogLevel } from './common/constants';

interface SharedArgs {
  submit: boolean | undefined;
  recursive: boolean | undefined;
  jobScript: string | undefined;
  allowList: string | undefined;
  format: string | undefined;
  dryRun: boolean;
  keepGoing: boolean;
  verifyOutput: boolean;
  logLevel: LogLevel | undefined;
}

function toRequest(
  command: CommandName,
  inputDir: string,
  outputDir: string | undefined,
  args: SharedArgs
): DispatchRequest {
  return {
    command,
    inputDir,
    outputDir,
    submit: args.submit,
    recursive: args.recursive,
    jobScript: args.jobScript,
    allowList: args.allowList,
    format: args.format,
    dryRun: args.dryRun,
    keepGoing: args.keepGoing,
    verifyOutput: args.verifyOutput,
    logLevel: args.logLevel,
  };
}

/**
 * Parse command-line arguments. Resolves to null when only help or the
 * version was requested.
 */
export async function parseArgs(argv: string[]): Promise<DispatchRequest | null> {
  const requests: DispatchRequest[] = [];

  await yargs(argv)
    .scriptName('pose-dispatch')
    .usage('$0 <command> [options]')
    .option('submit', {
      type: 'boolean',
      describe: 'Submit each file through the job queue instead of running the tool directly',
    })
    .option('recursive', {
      type: 'boolean',
      describe: 'Search subdirectories of the input directory',
    })
    .option('job-script', {
      type: 'string',
      describe: 'Job script handed to the submission command',
    })
    .option('allow-list', {
      type: 'string',
      describe: 'Text file of basenames; other files are skipped',
    })
    .option('format', {
      type: 'string',
      describe: 'Output format passed to the tool',
    })
    .option('dry-run', {
      type: 'boolean',
      default: false,
      describe: 'Print the output paths without invoking anything',
    })
    .option('keep-going', {
      type: 'boolean',
      default: false,
      describe: 'Continue with the remaining files after a failure',
    })
    .option('verify-output', {
      type: 'boolean',
      default: false,
      describe: 'Check that each output file exists after a direct run',
    })
    .option('log-level', {
      choices: LOG_LEVELS,
      describe: 'Override LOG_LEVEL',
    })
    .command(
      'pose <input_dir> [output_dir]',
      'Run video_to_pose on every .mpg/.mp4 file',
      y => y
        .positional('input_dir', { type: 'string', demandOption: true })
        .positional('output_dir', { type: 'string' }),
      args => {
        requests.push(toRequest('pose', args.input_dir, args.output_dir, args));
      }
    )
    .command(
      'segments <directory>',
      'Run pose_to_segments on every .pose file',
      y => y.positional('directory', { type: 'string', demandOption: true }),
      args => {
        requests.push(toRequest('segments', args.directory, undefined, args));
      }
    )
    .demandCommand(1, 'A command is required')
    .strict()
    .exitProcess(false)
    .fail((msg, err) => {
      if (err) throw err;
      throw new ConfigurationError(msg);
    })
    .help()
    .parseAsync();

  return requests[0] ?? null;
}

/**
 * Report an error on stderr and pick the process exit code
 */
export function reportError(error: unknown): number {
  console.error(`[pose-dispatch] ✗ ${getErrorMessage(error)}`);

  if (error instanceof ExternalToolError && error.details) {
    console.error(error.details.trim());
  }

  return error instanceof AppError ? error.exitCode : 1;
}

async function main(): Promise<void> {
  const request = await parseArgs(hideBin(process.argv));
  if (request === null) return;

  const env = loadEnvConfig();
  const dispatcher = buildDispatcher(request, env);
  await dispatcher.run();
}

if (require.main === module) {
  main().catch(error => {
    process.exitCode = reportError(error);
  });
}
