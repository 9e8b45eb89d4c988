/**
 * Allow-list of basenames
 *
 * One basename (without extension) per line. A file is processed only when
 * its stem equals a line exactly, like `grep -Fx`.
 */

import path from 'path';
import fs from 'fs-extra';
import { ConfigurationError, InputFormatError, getErrorMessage } from '../../../common/errors';
import { getStem, matchExtension } from '../../../common/utils';

export type AllowList = ReadonlySet<string>;

export function parseAllowList(content: string, source: string): AllowList {
  const entries = new Set<string>();

  content.split('\n').forEach((rawLine, index) => {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (line.trim() === '') return;

    if (line.includes('\0')) {
      throw new InputFormatError(`${source}:${index + 1}: allow-list contains binary data`, index + 1);
    }
    if (line.includes('/') || line.includes('\\')) {
      throw new InputFormatError(
        `${source}:${index + 1}: expected a basename, got a path "${line}"`,
        index + 1
      );
    }

    entries.add(line);
  });

  return entries;
}

export async function loadAllowList(filePath: string): Promise<AllowList> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read allow-list ${filePath}: ${getErrorMessage(error)}`);
  }

  return parseAllowList(content, path.basename(filePath));
}

export function shouldProcess(
  inputPath: string,
  sourceExtensions: readonly string[],
  allowList: AllowList | null
): boolean {
  if (allowList === null) return true;

  const ext = matchExtension(inputPath, sourceExtensions) ?? path.extname(inputPath);
  return allowList.has(getStem(inputPath, ext));
}
