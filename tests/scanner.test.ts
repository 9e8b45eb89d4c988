import path from 'path';
import fs from 'fs-extra';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { enumerateInputs, patternsForExtensions } from '../src/modules/dispatch';
import { ConfigurationError } from '../src/common/errors';
import { makeTmpDir, touch } from './helpers/tmpDir';

describe('patternsForExtensions', () => {
  it('builds one glob per extension', () => {
    expect(patternsForExtensions(['.mpg', '.mp4'])).toEqual(['*.mpg', '*.mp4']);
  });
});

describe('enumerateInputs', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTmpDir();
    await touch(dir, 'b.mpg', 'a.mp4', 'notes.txt', 'sub/c.mp4', 'sub/deeper/d.mpg');
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('lists top-level matches in sorted order', async () => {
    const files = await enumerateInputs(dir, ['*.mpg', '*.mp4'], { recursive: false });
    expect(files).toEqual([path.join(dir, 'a.mp4'), path.join(dir, 'b.mpg')]);
  });

  it('descends into subdirectories when recursive', async () => {
    const files = await enumerateInputs(dir, ['*.mpg', '*.mp4'], { recursive: true });
    expect(files).toEqual([
      path.join(dir, 'a.mp4'),
      path.join(dir, 'b.mpg'),
      path.join(dir, 'sub/c.mp4'),
      path.join(dir, 'sub/deeper/d.mpg'),
    ]);
  });

  it('ignores directories named like inputs', async () => {
    await fs.ensureDir(path.join(dir, 'folder.mp4'));
    const files = await enumerateInputs(dir, ['*.mp4'], { recursive: false });
    expect(files).toEqual([path.join(dir, 'a.mp4')]);
  });

  it('matches extensions case-sensitively', async () => {
    await touch(dir, 'CLIP.MP4', 'other.Mp4');
    const files = await enumerateInputs(dir, ['*.mp4'], { recursive: false });
    expect(files).toEqual([path.join(dir, 'a.mp4')]);
  });

  it('includes hidden files and directories when recursive, like find', async () => {
    await touch(dir, '.e.mp4', '.cache/f.mpg');
    const files = await enumerateInputs(dir, ['*.mpg', '*.mp4'], { recursive: true });
    expect(files).toEqual([
      path.join(dir, '.cache/f.mpg'),
      path.join(dir, '.e.mp4'),
      path.join(dir, 'a.mp4'),
      path.join(dir, 'b.mpg'),
      path.join(dir, 'sub/c.mp4'),
      path.join(dir, 'sub/deeper/d.mpg'),
    ]);
  });

  it('skips hidden files on a flat scan, like the shell glob', async () => {
    await touch(dir, '.e.mp4');
    const files = await enumerateInputs(dir, ['*.mp4'], { recursive: false });
    expect(files).toEqual([path.join(dir, 'a.mp4')]);
  });

  it('returns nothing when no file matches', async () => {
    expect(await enumerateInputs(dir, ['*.pose'], { recursive: true })).toEqual([]);
  });

  it('fails on a missing directory', async () => {
    await expect(
      enumerateInputs(path.join(dir, 'missing'), ['*.mp4'], { recursive: false })
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('fails when the input is a file', async () => {
    await expect(
      enumerateInputs(path.join(dir, 'a.mp4'), ['*.mp4'], { recursive: false })
    ).rejects.toThrow(`Input path is not a directory: ${path.join(dir, 'a.mp4')}`);
  });
});
