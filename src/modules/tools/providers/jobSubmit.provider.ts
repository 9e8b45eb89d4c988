/**
 * Job Submission Provider - Wraps a tool invocation for the cluster queue
 *
 * `sbatch job.sh video_to_pose -i IN ...` returns as soon as the job is
 * enqueued; the tool itself runs later on the scheduler.
 */

import { ToolInvocation, SubmitOptions } from '../tools.types';

export function wrapForSubmission(invocation: ToolInvocation, options: SubmitOptions): ToolInvocation {
  return {
    command: options.submitBin,
    args: [options.jobScript, invocation.command, ...invocation.args],
  };
}
