export interface InvokeOptions {
  cwd: string;
}

/** Outcome of one compiler process. `status` is null when a signal ended it. */
export interface ProcessResult {
  status: number | null;
  signal: string | null;
  stdout: string;
  stderr: string;
  commandLine: string;
}

export interface ICompilerInvoker {
  /** @throws when the process cannot be started at all */
  invoke(binaryPath: string, args: string[], options: InvokeOptions): Promise<ProcessResult>;
}
