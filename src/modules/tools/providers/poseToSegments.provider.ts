/**
 * pose_to_segments Provider - Sign/sentence segmentation of .pose files
 *
 * `probs` writes the raw probabilities as a numpy array, `elan` writes an
 * annotated ELAN document.
 */

import { ToolProvider } from '../tools.types';
import { ConfigurationError } from '../../../common/errors';
import {
  POSE_EXTENSIONS,
  SEGMENT_EXTENSIONS,
  SEGMENT_FORMATS,
  DEFAULT_SEGMENT_FORMAT,
  isSegmentFormat,
} from '../../../common/constants';

export interface PoseToSegmentsOptions {
  bin: string;
  format?: string;
}

export function createPoseToSegmentsProvider(options: PoseToSegmentsOptions): ToolProvider {
  const format = options.format ?? DEFAULT_SEGMENT_FORMAT;

  if (!isSegmentFormat(format)) {
    throw new ConfigurationError(
      `Unsupported segment format "${format}". Expected one of: ${SEGMENT_FORMATS.join(', ')}`
    );
  }

  return {
    name: 'pose_to_segments',
    bin: options.bin,
    format,
    sourceExtensions: POSE_EXTENSIONS,
    targetExtension: SEGMENT_EXTENSIONS[format],
    buildArgs: (inputPath, outputPath) => ['-i', inputPath, '-o', outputPath, '-f', format],
  };
}
