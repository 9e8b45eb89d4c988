/**
 * Environment configuration
 */

import { z } from 'zod';
import { ConfigurationError } from '../common/errors';
import {
  LOG_LEVELS,
  VIDEO_TO_POSE_BIN,
  POSE_TO_SEGMENTS_BIN,
  JOB_SUBMIT_BIN,
  JOB_SCRIPT,
} from '../common/constants';

const binary = (fallback: string) => z.string().trim().min(1).default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  VIDEO_TO_POSE_BIN: binary(VIDEO_TO_POSE_BIN),
  POSE_TO_SEGMENTS_BIN: binary(POSE_TO_SEGMENTS_BIN),
  JOB_SUBMIT_BIN: binary(JOB_SUBMIT_BIN),
  JOB_SCRIPT: binary(JOB_SCRIPT),
});

export interface EnvConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  videoToPoseBin: string;
  poseToSegmentsBin: string;
  jobSubmitBin: string;
  jobScript: string;
}

/**
 * Parse configuration from an environment map
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    nodeEnv: values.NODE_ENV,
    logLevel: values.LOG_LEVEL,
    videoToPoseBin: values.VIDEO_TO_POSE_BIN,
    poseToSegmentsBin: values.POSE_TO_SEGMENTS_BIN,
    jobSubmitBin: values.JOB_SUBMIT_BIN,
    jobScript: values.JOB_SCRIPT,
  };
}
