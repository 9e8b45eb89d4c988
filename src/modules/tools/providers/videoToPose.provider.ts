/**
 * video_to_pose Provider - Pose extraction from .mpg/.mp4 videos
 */

import { ToolProvider } from '../tools.types';
import { ConfigurationError } from '../../../common/errors';
import {
  VIDEO_EXTENSIONS,
  POSE_EXTENSION,
  DEFAULT_POSE_FORMAT,
  POSE_FORMATS,
  isPoseFormat,
} from '../../../common/constants';

export interface VideoToPoseOptions {
  bin: string;
  format?: string;
}

export function createVideoToPoseProvider(options: VideoToPoseOptions): ToolProvider {
  const format = options.format ?? DEFAULT_POSE_FORMAT;

  if (!isPoseFormat(format)) {
    throw new ConfigurationError(
      `Unsupported pose format "${format}". Expected one of: ${POSE_FORMATS.join(', ')}`
    );
  }

  return {
    name: 'video_to_pose',
    bin: options.bin,
    format,
    sourceExtensions: VIDEO_EXTENSIONS,
    targetExtension: POSE_EXTENSION,
    buildArgs: (inputPath, outputPath) => ['-i', inputPath, '--format', format, '-o', outputPath],
  };
}
