/**
 * Runner Module - External process execution
 */

export { SpawnCommandRunner } from './command.runner';
export type { CommandRunner, CommandResult } from './command.runner';
