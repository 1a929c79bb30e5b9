import { execFile } from 'node:child_process';
import type { ICompilerInvoker, InvokeOptions, ProcessResult } from '@domain/ports/compiler-invoker.js';
import { logger } from '@shared/lib/logger.js';

/** Raw outcome of execFile before it is mapped to a ProcessResult. */
export interface RawExecResult {
  /** Exit status, or an errno string such as 'ENOENT' when spawning failed. */
  code: number | string | null;
  signal: string | null;
  stdout: string;
  stderr: string;
}

export type ExecFn = (
  file: string,
  args: string[],
  options: { cwd: string; maxBuffer: number },
) => Promise<RawExecResult>;

export class CompilerSpawnError extends Error {
  constructor(
    message: string,
    public readonly commandLine: string,
  ) {
    super(message);
    this.name = 'CompilerSpawnError';
  }
}

const MAX_BUFFER = 64 * 1024 * 1024;

const defaultExec: ExecFn = (file, args, options) =>
  new Promise((resolve) => {
    execFile(file, args, { ...options, encoding: 'utf-8' }, (error, stdout, stderr) => {
      if (!error) {
        resolve({ code: 0, signal: null, stdout, stderr });
        return;
      }
      const code: unknown = error.code;
      resolve({
        code: typeof code === 'number' || typeof code === 'string' ? code : null,
        signal: typeof error.signal === 'string' ? error.signal : null,
        stdout,
        stderr,
      });
    });
  });

export function formatCommandLine(file: string, args: string[]): string {
  return [file, ...args].map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part)).join(' ');
}

/**
 * Runs the compiler under test as a child process and captures its output.
 * A non-zero exit is a normal result; only a failure to start is thrown.
 */
export class CompilerProcess implements ICompilerInvoker {
  // Injection point for testing
  private _exec: ExecFn = defaultExec;

  /** Replace the exec function (for testing). */
  setExecFunction(execFn: ExecFn): void {
    this._exec = execFn;
  }

  async invoke(binaryPath: string, args: string[], options: InvokeOptions): Promise<ProcessResult> {
    const commandLine = formatCommandLine(binaryPath, args);
    logger.debug('Invoking compiler', { commandLine, cwd: options.cwd });

    const raw = await this._exec(binaryPath, args, { cwd: options.cwd, maxBuffer: MAX_BUFFER });
    if (typeof raw.code === 'string') {
      throw new CompilerSpawnError(`Failed to run ${binaryPath}: ${raw.code}`, commandLine);
    }

    return {
      status: raw.signal === null ? raw.code ?? 0 : null,
      signal: raw.signal,
      stdout: raw.stdout,
      stderr: raw.stderr,
      commandLine,
    };
  }
}
