/**
 * Dispatch Types
 */

import type { ToolProvider, DispatchMode, SubmitOptions } from '../tools';

export type Placement =
  | { kind: 'relocate'; outputDir: string }
  | { kind: 'in-place' };

export interface PathRule {
  sourceExtensions: readonly string[];
  targetExtension: string;
  placement: Placement;
}

export interface DispatchConfig {
  inputDir: string;
  placement: Placement;
  tool: ToolProvider;
  /** Search subdirectories as well as the top level */
  recursive: boolean;
  mode: DispatchMode;
  submit: SubmitOptions;
  allowListPath: string | null;
  dryRun: boolean;
  keepGoing: boolean;
  /** Check that direct-mode outputs exist and are non-empty */
  verifyOutput: boolean;
}

export interface DispatchPair {
  inputPath: string;
  outputPath: string;
}

export interface DispatchPlan {
  pairs: DispatchPair[];
  /** Inputs left out by the allow-list */
  skipped: string[];
}

export type ItemStatus = 'pending' | 'planned' | 'dispatched' | 'failed';

export interface DispatchItem extends DispatchPair {
  status: ItemStatus;
  command: string | null;
  duration: number | null;
  error: string | null;
}

export interface DispatchReport {
  runId: string;
  tool: string;
  mode: DispatchMode;
  dryRun: boolean;
  items: DispatchItem[];
  skipped: string[];
  dispatchedCount: number;
  failedCount: number;
  totalCount: number;
}
