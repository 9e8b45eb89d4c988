export { createVideoToPoseProvider } from './videoToPose.provider';
export type { VideoToPoseOptions } from './videoToPose.provider';
export { createPoseToSegmentsProvider } from './poseToSegments.provider';
export type { PoseToSegmentsOptions } from './poseToSegments.provider';
export { wrapForSubmission } from './jobSubmit.provider';
