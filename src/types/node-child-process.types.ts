/**
 * Shape of the error thrown by `execFileSync` when the child exits with a non-zero status.
 */
export interface ExecSyncError extends Error {
  /**
   * The exit code of the subprocess, or null if it was terminated by a signal.
   */
  status: number | null;

  /**
   * Captured standard output.
   */
  stdout: Buffer | string;

  /**
   * Captured standard error.
   */
  stderr: Buffer | string;
}
