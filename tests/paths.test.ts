import { describe, it, expect } from 'vitest';
import { deriveOutputPath, PathRule } from '../src/modules/dispatch';
import { ConfigurationError } from '../src/common/errors';

const relocate: PathRule = {
  sourceExtensions: ['.mpg', '.mp4'],
  targetExtension: '.pose',
  placement: { kind: 'relocate', outputDir: '/out/' },
};

const inPlace: PathRule = {
  sourceExtensions: ['.pose'],
  targetExtension: '.seg.npy',
  placement: { kind: 'in-place' },
};

describe('deriveOutputPath', () => {
  it('moves videos into the output directory', () => {
    expect(deriveOutputPath('/videos/a.mp4', relocate)).toBe('/out/a.pose');
    expect(deriveOutputPath('/videos/b.mpg', relocate)).toBe('/out/b.pose');
  });

  it('keeps only the basename of nested inputs', () => {
    expect(deriveOutputPath('/videos/2021/01/c.mpg', relocate)).toBe('/out/c.pose');
  });

  it('joins output directories without a trailing slash', () => {
    const rule: PathRule = { ...relocate, placement: { kind: 'relocate', outputDir: 'poses' } };
    expect(deriveOutputPath('videos/d.mp4', rule)).toBe('poses/d.pose');
  });

  it('substitutes in place for pose files', () => {
    expect(deriveOutputPath('/data/poses/x.pose', inPlace)).toBe('/data/poses/x.seg.npy');
  });

  it('does not rewrite matching text elsewhere in the path', () => {
    expect(deriveOutputPath('/archive.mpg/e.mpg', relocate)).toBe('/out/e.pose');
    expect(deriveOutputPath('/runs.pose/x.pose', inPlace)).toBe('/runs.pose/x.seg.npy');
  });

  it('rejects inputs without a source extension', () => {
    expect(() => deriveOutputPath('/videos/notes.txt', relocate)).toThrow(ConfigurationError);
  });

  it('is deterministic', () => {
    const inputs = ['/v/a.mp4', '/v/b.mpg'];
    const first = inputs.map(input => deriveOutputPath(input, relocate));
    const second = inputs.map(input => deriveOutputPath(input, relocate));
    expect(second).toEqual(first);
  });
});
