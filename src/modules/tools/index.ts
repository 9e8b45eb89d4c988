/**
 * Tools Module - Command lines for the external tools
 */

import { ToolProvider, ToolInvocation, DispatchMode, SubmitOptions } from './tools.types';
import { wrapForSubmission } from './providers';

export * from './providers';
export * from './tools.types';

/**
 * Build the command to run for one input/output pair
 */
export function buildInvocation(
  tool: ToolProvider,
  inputPath: string,
  outputPath: string,
  mode: DispatchMode,
  submit: SubmitOptions
): ToolInvocation {
  const invocation: ToolInvocation = {
    command: tool.bin,
    args: tool.buildArgs(inputPath, outputPath),
  };

  return mode === 'submit' ? wrapForSubmission(invocation, submit) : invocation;
}
