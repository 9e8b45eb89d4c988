/**
 * Batch Dispatcher - Runs the external tool once per matching input file
 *
 * Inputs are processed sequentially. In direct mode each tool process is
 * awaited before the next one starts; in submit mode only the submission
 * command is awaited.
 */

import fs from 'fs-extra';
import { v4 as uuidv4 } from 'uuid';
import { ConfigurationError, ExternalToolError, getErrorMessage } from '../../common/errors';
import { formatCommand, matchExtension } from '../../common/utils';
import { createSilentLogger, Logger } from '../../common/logger';
import { buildInvocation } from '../tools';
import type { CommandRunner } from '../runner';
import { enumerateInputs, patternsForExtensions } from './dispatch.scanner';
import { deriveOutputPath } from './dispatch.paths';
import { loadAllowList, shouldProcess, AllowList } from './utils/allowList';
import {
  DispatchConfig,
  DispatchItem,
  DispatchPair,
  DispatchPlan,
  DispatchReport,
  PathRule,
} from './dispatch.types';

export interface DispatcherDeps {
  runner: CommandRunner;
  logger?: Logger;
  /** Receives each output path before its dispatch */
  print?: (line: string) => void;
}

/**
 * Raised when one or more dispatches failed. Carries the report so callers
 * can see which inputs were processed.
 */
export class DispatchFailedError extends ExternalToolError {
  constructor(
    message: string,
    cause: ExternalToolError,
    public readonly report: DispatchReport
  ) {
    super(message, cause.command, cause.toolExitCode, cause.details);
    this.name = 'DispatchFailedError';
  }
}

export class BatchDispatcher {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly print: (line: string) => void;

  constructor(private readonly config: DispatchConfig, deps: DispatcherDeps) {
    this.runner = deps.runner;
    this.logger = deps.logger ?? createSilentLogger();
    this.print = deps.print ?? (line => console.log(line));
  }

  get pathRule(): PathRule {
    return {
      sourceExtensions: this.config.tool.sourceExtensions,
      targetExtension: this.config.tool.targetExtension,
      placement: this.config.placement,
    };
  }

  /**
   * Discover inputs, apply the allow-list and derive output paths
   */
  async plan(): Promise<DispatchPlan> {
    const { inputDir, tool, recursive, allowListPath } = this.config;

    const inputs = await enumerateInputs(
      inputDir,
      patternsForExtensions(tool.sourceExtensions),
      { recursive }
    );

    let allowList: AllowList | null = null;
    if (allowListPath !== null) {
      allowList = await loadAllowList(allowListPath);
      if (allowList.size === 0) {
        this.logger.warn(`Allow-list ${allowListPath} is empty, nothing will be dispatched`);
      }
    }

    const rule = this.pathRule;
    const pairs: DispatchPair[] = [];
    const skipped: string[] = [];

    const claimed = new Map<string, string>();

    for (const inputPath of inputs) {
      // `.mp4` on its own is a hidden file with no name to carry over
      if (matchExtension(inputPath, tool.sourceExtensions) === null) {
        this.logger.warn(`Ignoring ${inputPath}: no file name before the extension`);
        continue;
      }

      if (!shouldProcess(inputPath, tool.sourceExtensions, allowList)) {
        skipped.push(inputPath);
        continue;
      }

      const outputPath = deriveOutputPath(inputPath, rule);
      const previous = claimed.get(outputPath);
      if (previous !== undefined) {
        throw new ConfigurationError(
          `${previous} and ${inputPath} would both write ${outputPath}`
        );
      }
      claimed.set(outputPath, inputPath);
      pairs.push({ inputPath, outputPath });
    }

    return { pairs, skipped };
  }

  /**
   * Run the external command for one pair
   */
  async dispatch(pair: DispatchPair): Promise<{ command: string; duration: number }> {
    const { tool, mode, submit, verifyOutput } = this.config;
    const invocation = buildInvocation(tool, pair.inputPath, pair.outputPath, mode, submit);
    const command = formatCommand(invocation.command, invocation.args);
    const startTime = Date.now();

    try {
      await this.runner.run(invocation.command, invocation.args);
    } catch (error) {
      if (error instanceof ExternalToolError) throw error;
      throw new ExternalToolError(getErrorMessage(error), command);
    }

    if (verifyOutput && mode === 'direct') {
      await this.verifyOutputFile(pair.outputPath, command);
    }

    return { command, duration: Date.now() - startTime };
  }

  /**
   * Plan, then dispatch every pair in order
   */
  async run(): Promise<DispatchReport> {
    const runId = uuidv4();
    const log = this.logger.child({ runId });
    const { tool, mode, dryRun, keepGoing, placement } = this.config;

    const { pairs, skipped } = await this.plan();
    log.info(`Dispatching ${pairs.length} file(s) to ${tool.name} (${mode}${dryRun ? ', dry run' : ''})`);
    if (skipped.length > 0) {
      log.info(`Skipped ${skipped.length} file(s) not in the allow-list`);
    }

    const report: DispatchReport = {
      runId,
      tool: tool.name,
      mode,
      dryRun,
      items: pairs.map((pair): DispatchItem => ({
        ...pair,
        status: 'pending',
        command: null,
        duration: null,
        error: null,
      })),
      skipped,
      dispatchedCount: 0,
      failedCount: 0,
      totalCount: pairs.length,
    };

    if (!dryRun && placement.kind === 'relocate' && pairs.length > 0) {
      try {
        await fs.ensureDir(placement.outputDir);
      } catch (error) {
        throw new ConfigurationError(
          `Cannot create output directory ${placement.outputDir}: ${getErrorMessage(error)}`
        );
      }
    }

    let firstFailure: ExternalToolError | null = null;

    for (const item of report.items) {
      this.print(item.outputPath);
      log.debug({ input: item.inputPath, output: item.outputPath }, 'Derived output path');

      const invocation = buildInvocation(tool, item.inputPath, item.outputPath, mode, this.config.submit);
      const command = formatCommand(invocation.command, invocation.args);
      item.command = command;

      if (dryRun) {
        item.status = 'planned';
        continue;
      }

      try {
        const result = await this.dispatch(item);
        item.status = 'dispatched';
        item.duration = result.duration;
        report.dispatchedCount++;
        log.info(`✓ ${mode === 'submit' ? 'Submitted' : 'Completed'}: ${item.inputPath} (${result.duration}ms)`);
      } catch (error) {
        const failure = error instanceof ExternalToolError
          ? error
          : new ExternalToolError(getErrorMessage(error), command);

        item.status = 'failed';
        item.error = failure.message;
        report.failedCount++;
        firstFailure = firstFailure ?? failure;
        log.error({ err: failure }, `✗ Failed: ${item.inputPath} - ${failure.message}`);

        if (!keepGoing) {
          throw new DispatchFailedError(failure.message, failure, report);
        }
      }
    }

    log.info(
      `Run complete: ${report.dispatchedCount} dispatched, ${report.failedCount} failed, ${skipped.length} skipped`
    );

    if (firstFailure !== null) {
      throw new DispatchFailedError(
        `${report.failedCount} of ${report.totalCount} dispatches failed`,
        firstFailure,
        report
      );
    }

    return report;
  }

  private async verifyOutputFile(outputPath: string, command: string): Promise<void> {
    if (!await fs.pathExists(outputPath)) {
      throw new ExternalToolError(`${this.config.tool.name} produced no output file: ${outputPath}`, command);
    }

    const stats = await fs.stat(outputPath);
    if (stats.size === 0) {
      throw new ExternalToolError(`${this.config.tool.name} produced an empty output file: ${outputPath}`, command);
    }
  }
}
