/**
 * Platform Types
 */

export interface CommandResult {
  /** Exit status; null when the process could not be started */
  status: number | null;
  /** Combined stdout and stderr, or the spawn error message */
  output: string;
}

/**
 * Runs a command to completion
 */
export interface CommandRunner {
  run(command: readonly string[]): CommandResult;
}

/**
 * The editor side of URI opening: shows a local file in a read-only view
 */
export interface EditorHost {
  view(filePath: string): void | Promise<void>;
}
