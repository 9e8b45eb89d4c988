/**
 * Command Runner - Spawns external tools and waits for them to exit
 *
 * The dispatcher only talks to the CommandRunner interface, so tests can
 * record invocations instead of spawning processes.
 */

import { spawn } from 'child_process';
import { ExternalToolError, COMMAND_NOT_FOUND_EXIT_CODE } from '../../common/errors';
import { formatCommand } from '../../common/utils';
import type { Logger } from '../../common/logger';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
}

export interface CommandRunner {
  /**
   * Run a command to completion. Rejects with ExternalToolError when the
   * command is missing or exits non-zero.
   */
  run(command: string, args: readonly string[]): Promise<CommandResult>;
}

export class SpawnCommandRunner implements CommandRunner {
  constructor(private readonly logger: Logger) {}

  run(command: string, args: readonly string[]): Promise<CommandResult> {
    const commandLine = formatCommand(command, args);
    const log = this.logger.child({ command });

    return new Promise((resolve, reject) => {
      const startTime = Date.now();
      log.debug(`Running: ${commandLine}`);

      const proc = spawn(command, [...args], {
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      const stdoutLines = splitLines(line => log.info(line));
      const stderrLines = splitLines(line => log.warn(line));

      proc.stdout?.on('data', (data: Buffer) => {
        const output = data.toString();
        stdout = keepTail(stdout + output);
        stdoutLines.push(output);
      });

      proc.stderr?.on('data', (data: Buffer) => {
        const output = data.toString();
        stderr = keepTail(stderr + output);
        stderrLines.push(output);
      });

      proc.on('error', (error: NodeJS.ErrnoException) => {
        log.error(`Process error: ${error.message}`);

        if (error.code === 'ENOENT') {
          reject(new ExternalToolError(
            `Command not found: ${command}`,
            commandLine,
            COMMAND_NOT_FOUND_EXIT_CODE
          ));
          return;
        }

        reject(new ExternalToolError(
          `Failed to start ${command}: ${error.message}`,
          commandLine
        ));
      });

      proc.on('close', (code, signal) => {
        const duration = Date.now() - startTime;
        stdoutLines.flush();
        stderrLines.flush();

        if (code !== 0) {
          const reason = code === null ? `was killed by ${signal ?? 'a signal'}` : `failed with exit code ${code}`;
          reject(new ExternalToolError(
            `${command} ${reason}`,
            commandLine,
            code,
            stderr || stdout
          ));
          return;
        }

        log.debug(`Exit code 0 in ${duration}ms`);
        resolve({ exitCode: 0, stdout, stderr, duration });
      });
    });
  }
}

// Only the end of a tool's output is kept for error details
export const MAX_CAPTURED_OUTPUT = 64 * 1024;

function keepTail(text: string): string {
  return text.length > MAX_CAPTURED_OUTPUT ? text.slice(-MAX_CAPTURED_OUTPUT) : text;
}

/**
 * Hands complete lines to onLine as chunks arrive; flush() emits the rest
 */
function splitLines(onLine: (line: string) => void) {
  let pending = '';

  return {
    push(chunk: string): void {
      const lines = (pending + chunk).split('\n');
      pending = lines.pop() ?? '';
      lines.map(line => line.trimEnd()).filter(Boolean).forEach(onLine);
    },
    flush(): void {
      const rest = pending.trimEnd();
      pending = '';
      if (rest) onLine(rest);
    },
  };
}
