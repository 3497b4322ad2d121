/**
 * Remote Executor Contract
 * @module deployment/remote-executor
 *
 * The single channel through which the orchestrator reaches the cluster:
 * shell commands, file transfer and scheduler calls. Implementations do not
 * retry; a transport failure is thrown as a ConnectivityError and the
 * deployment manager owns the retry policy.
 */

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export function commandSucceeded(result: CommandResult): boolean {
  return result.exitCode === 0;
}

export interface RemoteExecutor {
  execute(command: string, cwd?: string): Promise<CommandResult>;
  upload(localPath: string, remotePath: string): Promise<boolean>;
  download(remotePath: string, localPath: string): Promise<boolean>;
  /** Returns the scheduler's job id, or null when the submission was rejected */
  submitJob(scriptPath: string): Promise<string | null>;
  /** Raw scheduler state string, or null when the job is unknown */
  jobStatus(jobId: string): Promise<string | null>;
  cancelJob(jobId: string): Promise<boolean>;
}

/**
 * Quote a value for a POSIX shell command line
 */
export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_./:=@%+-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
