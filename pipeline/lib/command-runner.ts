import { execFileSync } from 'child_process';

export interface CommandRunner {
  /**
   * Runs a command to completion. Throws when it cannot start or exits
   * non-zero.
   */
  run(command: string, args: string[], cwd: string): void;
}

/**
 * Runs commands synchronously with the pipeline's stdio so tool output lands
 * in the CI log.
 */
export class ShellCommandRunner implements CommandRunner {
  run(command: string, args: string[], cwd: string): void {
    execFileSync(command, args, { cwd, stdio: 'inherit' });
  }
}
