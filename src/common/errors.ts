/**
 * Application error types
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: number = 1
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Bad or missing arguments, directories and environment values
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', 2);
    this.name = 'ConfigurationError';
  }
}

/**
 * Malformed allow-list files
 */
export class InputFormatError extends AppError {
  constructor(message: string, public readonly line?: number) {
    super(message, 'INPUT_FORMAT_ERROR', 3);
    this.name = 'InputFormatError';
  }
}

/**
 * A spawned command could not start or exited non-zero
 */
export class ExternalToolError extends AppError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly toolExitCode: number | null = null,
    public readonly details?: string
  ) {
    super(message, 'EXTERNAL_TOOL_ERROR', exitCodeForTool(toolExitCode));
    this.name = 'ExternalToolError';
  }
}

// 127 mirrors the shell's "command not found"
export const COMMAND_NOT_FOUND_EXIT_CODE = 127;

function exitCodeForTool(code: number | null): number {
  if (code !== null && code > 0 && code < 256) return code;
  return 1;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
