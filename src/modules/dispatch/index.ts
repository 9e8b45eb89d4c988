/**
 * Dispatch Module - Batch invocation of the external tools
 */

export { BatchDispatcher, DispatchFailedError } from './dispatch.manager';
export type { DispatcherDeps } from './dispatch.manager';
export { enumerateInputs, patternsForExtensions } from './dispatch.scanner';
export { deriveOutputPath } from './dispatch.paths';
export { loadAllowList, parseAllowList, shouldProcess } from './utils/allowList';
export type { AllowList } from './utils/allowList';
export * from './dispatch.types';
