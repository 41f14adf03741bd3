import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export interface ExecResult {
  stdout: string;
  stderr: string;
}

export interface ExecOptions {
  cwd?: string;
  timeoutMs?: number;
}

export type ExecFn = (file: string, args: string[], opts?: ExecOptions) => Promise<ExecResult>;

export class ExecError extends Error {
  readonly file: string;
  readonly stderr: string;

  constructor(file: string, message: string, stderr: string) {
    super(message);
    this.name = 'ExecError';
    this.file = file;
    this.stderr = stderr;
  }
}

function normalizeExecError(file: string, error: unknown): ExecError {
  if (error && typeof error === 'object') {
    const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr.trim() : '';
    const stdout = 'stdout' in error && typeof error.stdout === 'string' ? error.stdout.trim() : '';
    const output = stderr || stdout;
    if (output) {
      const lastLines = output.split(/\r?\n/).slice(-5).join('\n');
      return new ExecError(file, `${file} failed: ${lastLines}`, stderr);
    }
    if (error instanceof Error) {
      return new ExecError(file, `${file} failed: ${error.message}`, '');
    }
  }
  return new ExecError(file, `${file} failed`, '');
}

/**
 * Run a binary without a shell and capture its output. Non-zero exits reject
 * with an ExecError carrying the tail of stderr.
 */
export const execTool: ExecFn = async (file, args, opts = {}) => {
  try {
    const result = await execFileAsync(file, args, {
      cwd: opts.cwd,
      timeout: opts.timeoutMs ?? 0,
      maxBuffer: 64 * 1024 * 1024,
      encoding: 'utf8',
    });
    return { stdout: result.stdout, stderr: result.stderr };
  } catch (error) {
    throw normalizeExecError(file, error);
  }
};
