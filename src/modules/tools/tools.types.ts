/**
 * External Tool Types
 */

export type ToolName = 'video_to_pose' | 'pose_to_segments';

export type DispatchMode = 'direct' | 'submit';

export interface ToolInvocation {
  command: string;
  args: string[];
}

export interface ToolProvider {
  name: ToolName;
  /** Binary to execute, the tool name unless overridden */
  bin: string;
  format: string;
  sourceExtensions: readonly string[];
  targetExtension: string;
  buildArgs(inputPath: string, outputPath: string): string[];
}

export interface SubmitOptions {
  submitBin: string;
  jobScript: string;
}
