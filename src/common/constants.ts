/**
 * Application constants
 */

// Source extensions
export const VIDEO_EXTENSIONS = ['.mpg', '.mp4'] as const;
export const POSE_EXTENSIONS = ['.pose'] as const;

// Output formats accepted by the external tools
export const POSE_FORMATS = ['mediapipe'] as const;
export const SEGMENT_FORMATS = ['probs', 'elan'] as const;

export type PoseFormat = typeof POSE_FORMATS[number];
export type SegmentFormat = typeof SEGMENT_FORMATS[number];

export const DEFAULT_POSE_FORMAT: PoseFormat = 'mediapipe';
export const DEFAULT_SEGMENT_FORMAT: SegmentFormat = 'probs';

// Target extensions
export const POSE_EXTENSION = '.pose';
export const SEGMENT_EXTENSIONS: Record<SegmentFormat, string> = {
  probs: '.seg.npy',
  elan: '.eaf',
};

// Default binaries, overridable through the environment
export const VIDEO_TO_POSE_BIN = 'video_to_pose';
export const POSE_TO_SEGMENTS_BIN = 'pose_to_segments';
export const JOB_SUBMIT_BIN = 'sbatch';
export const JOB_SCRIPT = 'job.sh';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

/**
 * Check if a format is accepted by pose_to_segments
 */
export function isSegmentFormat(format: string): format is SegmentFormat {
  return SEGMENT_FORMATS.some(f => f === format);
}

/**
 * Check if a format is accepted by video_to_pose
 */
export function isPoseFormat(format: string): format is PoseFormat {
  return POSE_FORMATS.some(f => f === format);
}
