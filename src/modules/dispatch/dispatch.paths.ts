/**
 * Output path rules
 *
 *   relocate:  /videos/a/clip.mpg -> <outputDir>/clip.pose
 *   in-place:  /poses/clip.pose   -> /poses/clip.seg.npy
 */

import path from 'path';
import { ConfigurationError } from '../../common/errors';
import { matchExtension, replaceExtension } from '../../common/utils';
import { PathRule } from './dispatch.types';

export function deriveOutputPath(inputPath: string, rule: PathRule): string {
  const ext = matchExtension(inputPath, rule.sourceExtensions);
  if (ext === null) {
    throw new ConfigurationError(
      `Cannot derive an output path for ${inputPath}: expected one of ${rule.sourceExtensions.join(', ')}`
    );
  }

  if (rule.placement.kind === 'relocate') {
    const name = replaceExtension(path.basename(inputPath), ext, rule.targetExtension);
    return path.join(rule.placement.outputDir, name);
  }

  return replaceExtension(inputPath, ext, rule.targetExtension);
}
