/**
 * Path and command-line helpers
 */

import path from 'path';

/**
 * Find which of the given extensions the file name ends with.
 * The longest match wins so that `.seg.npy` beats `.npy`.
 */
export function matchExtension(filePath: string, extensions: readonly string[]): string | null {
  const name = path.basename(filePath);
  let match: string | null = null;

  for (const ext of extensions) {
    if (name.length > ext.length && name.endsWith(ext)) {
      if (match === null || ext.length > match.length) {
        match = ext;
      }
    }
  }

  return match;
}

/**
 * Basename with the given extension removed
 */
export function getStem(filePath: string, ext: string): string {
  return path.basename(filePath, ext);
}

/**
 * Replace a trailing extension, leaving the rest of the path untouched
 */
export function replaceExtension(filePath: string, from: string, to: string): string {
  if (!filePath.endsWith(from)) {
    return filePath;
  }
  return filePath.slice(0, filePath.length - from.length) + to;
}

/**
 * Render a command line for logs and dry runs
 */
export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].map(quoteArg).join(' ');
}

function quoteArg(arg: string): string {
  if (arg.length > 0 && /^[\w@%+=:,./-]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}
