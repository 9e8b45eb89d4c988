import { describe, it, expect } from 'vitest';
import {
  buildInvocation,
  createVideoToPoseProvider,
  createPoseToSegmentsProvider,
  wrapForSubmission,
} from '../src/modules/tools';
import { ConfigurationError } from '../src/common/errors';

const submit = { submitBin: 'sbatch', jobScript: 'job.sh' };

describe('video_to_pose provider', () => {
  const tool = createVideoToPoseProvider({ bin: 'video_to_pose' });

  it('passes the mediapipe format between input and output', () => {
    expect(tool.buildArgs('/v/a.mp4', '/out/a.pose')).toEqual([
      '-i', '/v/a.mp4', '--format', 'mediapipe', '-o', '/out/a.pose',
    ]);
  });

  it('maps videos to .pose files', () => {
    expect(tool.sourceExtensions).toEqual(['.mpg', '.mp4']);
    expect(tool.targetExtension).toBe('.pose');
  });

  it('rejects unknown formats', () => {
    expect(() => createVideoToPoseProvider({ bin: 'video_to_pose', format: 'openpose' })).toThrow(
      ConfigurationError
    );
  });
});

describe('pose_to_segments provider', () => {
  it('writes probabilities by default', () => {
    const tool = createPoseToSegmentsProvider({ bin: 'pose_to_segments' });
    expect(tool.targetExtension).toBe('.seg.npy');
    expect(tool.buildArgs('/p/x.pose', '/p/x.seg.npy')).toEqual([
      '-i', '/p/x.pose', '-o', '/p/x.seg.npy', '-f', 'probs',
    ]);
  });

  it('writes ELAN files for the elan format', () => {
    const tool = createPoseToSegmentsProvider({ bin: 'pose_to_segments', format: 'elan' });
    expect(tool.targetExtension).toBe('.eaf');
    expect(tool.buildArgs('/p/x.pose', '/p/x.eaf')).toEqual(['-i', '/p/x.pose', '-o', '/p/x.eaf', '-f', 'elan']);
  });

  it('rejects unknown formats', () => {
    expect(() => createPoseToSegmentsProvider({ bin: 'pose_to_segments', format: 'csv' })).toThrow(
      'Unsupported segment format "csv". Expected one of: probs, elan'
    );
  });
});

describe('buildInvocation', () => {
  const tool = createPoseToSegmentsProvider({ bin: 'pose_to_segments' });

  it('runs the tool binary in direct mode', () => {
    expect(buildInvocation(tool, '/p/x.pose', '/p/x.seg.npy', 'direct', submit)).toEqual({
      command: 'pose_to_segments',
      args: ['-i', '/p/x.pose', '-o', '/p/x.seg.npy', '-f', 'probs'],
    });
  });

  it('wraps the tool in the job script in submit mode', () => {
    expect(buildInvocation(tool, '/p/x.pose', '/p/x.seg.npy', 'submit', submit)).toEqual({
      command: 'sbatch',
      args: ['job.sh', 'pose_to_segments', '-i', '/p/x.pose', '-o', '/p/x.seg.npy', '-f', 'probs'],
    });
  });
});

describe('wrapForSubmission', () => {
  it('uses the configured submitter and script', () => {
    const wrapped = wrapForSubmission(
      { command: '/opt/bin/video_to_pose', args: ['-i', 'a.mp4'] },
      { submitBin: 'qsub', jobScript: '/jobs/gpu.sh' }
    );
    expect(wrapped).toEqual({ command: 'qsub', args: ['/jobs/gpu.sh', '/opt/bin/video_to_pose', '-i', 'a.mp4'] });
  });
});
