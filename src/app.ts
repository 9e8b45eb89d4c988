/**
 * Dispatcher setup - turns a CLI request and the environment into a
 * configured BatchDispatcher
 */

import { EnvConfig } from './config/env';
import { ConfigurationError } from './common/errors';
import { LogLevel } from './common/constants';
import { createLogger } from './common/logger';
import { BatchDispatcher, DispatchConfig, DispatcherDeps, Placement } from './modules/dispatch';
import { SpawnCommandRunner } from './modules/runner';
import {
  createVideoToPoseProvider,
  createPoseToSegmentsProvider,
  DispatchMode,
  ToolProvider,
} from './modules/tools';

export type CommandName = 'pose' | 'segments';

export interface DispatchRequest {
  command: CommandName;
  inputDir: string;
  outputDir?: string;
  submit?: boolean;
  recursive?: boolean;
  jobScript?: string;
  allowList?: string;
  format?: string;
  dryRun: boolean;
  keepGoing: boolean;
  verifyOutput: boolean;
  logLevel?: LogLevel;
}

interface Preset {
  tool: (env: EnvConfig, format: string | undefined) => ToolProvider;
  mode: DispatchMode;
  recursive: boolean;
}

// Defaults of the two batch scripts: videos are found recursively and
// processed directly, pose files sit in one directory and go to the queue.
const PRESETS: Record<CommandName, Preset> = {
  pose: {
    tool: (env, format) => createVideoToPoseProvider({ bin: env.videoToPoseBin, format }),
    mode: 'direct',
    recursive: true,
  },
  segments: {
    tool: (env, format) => createPoseToSegmentsProvider({ bin: env.poseToSegmentsBin, format }),
    mode: 'submit',
    recursive: false,
  },
};

export function createDispatchConfig(request: DispatchRequest, env: EnvConfig): DispatchConfig {
  if (request.inputDir.trim() === '') {
    throw new ConfigurationError('Input directory is required');
  }

  const preset = PRESETS[request.command];

  let placement: Placement = { kind: 'in-place' };
  if (request.outputDir !== undefined) {
    if (request.outputDir.trim() === '') {
      throw new ConfigurationError('Output directory must not be empty');
    }
    placement = { kind: 'relocate', outputDir: request.outputDir };
  }

  const mode: DispatchMode = request.submit === undefined
    ? preset.mode
    : request.submit ? 'submit' : 'direct';

  return {
    inputDir: request.inputDir,
    placement,
    tool: preset.tool(env, request.format),
    recursive: request.recursive ?? preset.recursive,
    mode,
    submit: {
      submitBin: env.jobSubmitBin,
      jobScript: request.jobScript ?? env.jobScript,
    },
    allowListPath: request.allowList ?? null,
    dryRun: request.dryRun,
    keepGoing: request.keepGoing,
    verifyOutput: request.verifyOutput,
  };
}

export function buildDispatcher(
  request: DispatchRequest,
  env: EnvConfig,
  deps: Partial<DispatcherDeps> = {}
): BatchDispatcher {
  const logger = deps.logger ?? createLogger({
    logLevel: request.logLevel ?? env.logLevel,
    nodeEnv: env.nodeEnv,
  });

  return new BatchDispatcher(createDispatchConfig(request, env), {
    runner: deps.runner ?? new SpawnCommandRunner(logger),
    logger,
    print: deps.print,
  });
}
