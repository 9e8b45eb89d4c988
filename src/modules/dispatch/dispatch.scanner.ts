/**
 * Input discovery
 */

import path from 'path';
import fs from 'fs-extra';
import { glob } from 'glob';
import { ConfigurationError } from '../../common/errors';

/**
 * `*.mp4` style patterns for a list of extensions
 */
export function patternsForExtensions(extensions: readonly string[]): string[] {
  return extensions.map(ext => `*${ext}`);
}

/**
 * List files under inputDir whose name matches any of the patterns.
 * Results are joined onto inputDir and sorted.
 *
 * Matching is case-sensitive on every platform. A recursive scan behaves
 * like `find -name`, so hidden files and directories are included; a flat
 * scan behaves like the shell's `*.ext`, which skips them.
 */
export async function enumerateInputs(
  inputDir: string,
  patterns: readonly string[],
  options: { recursive: boolean }
): Promise<string[]> {
  if (!await fs.pathExists(inputDir)) {
    throw new ConfigurationError(`Input directory does not exist: ${inputDir}`);
  }

  const stats = await fs.stat(inputDir);
  if (!stats.isDirectory()) {
    throw new ConfigurationError(`Input path is not a directory: ${inputDir}`);
  }

  const globs = patterns.map(pattern => options.recursive ? `**/${pattern}` : pattern);
  const matches = await glob(globs, {
    cwd: inputDir,
    nodir: true,
    nocase: false,
    dot: options.recursive,
  });

  return [...new Set(matches)]
    .map(match => path.join(inputDir, match))
    .sort();
}
