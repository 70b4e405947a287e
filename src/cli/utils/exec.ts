import { spawn } from 'node:child_process';

export type RunCommandResult = {
  readonly stdout: Buffer;
  readonly stderr: Buffer;
  readonly code: number;
};

export type RunCommandOptions = {
  input?: Uint8Array;
  cwd?: string;
};

/** Signature shared by `runCommand` and the in-process fakes used in tests. */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: RunCommandOptions,
) => Promise<RunCommandResult>;

export class CommandError extends Error {
  readonly command: string;
  readonly args: readonly string[];
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, args: readonly string[], exitCode: number, stderr: Buffer) {
    const detail = stderr.toString('utf8').trim().split('\n').pop();
    super(`${command} exited with code ${exitCode}${detail ? `: ${detail}` : ''}`);
    this.name = 'CommandError';
    this.command = command;
    this.args = [...args];
    this.exitCode = exitCode;
    this.stderr = stderr.toString('utf8');
  }
}

const isBrokenPipe = (error: Error): boolean =>
  'code' in error && (error.code === 'EPIPE' || error.code === 'ERR_STREAM_DESTROYED');

export const runCommand: CommandRunner = async (command, args, options = {}) => {
  const child = spawn(command, args, {
    cwd: options.cwd,
    stdio: options.input ? ['pipe', 'pipe', 'pipe'] : ['ignore', 'pipe', 'pipe'],
  });

  const stdoutChunks: Buffer[] = [];
  const stderrChunks: Buffer[] = [];
  child.stdout?.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
  child.stderr?.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

  let stdinError: Error | undefined;
  if (options.input) {
    const { buffer, byteOffset, byteLength } = options.input;
    // a child that exits before draining stdin closes the pipe; its exit code reports the failure
    child.stdin?.on('error', (error: Error) => {
      if (!isBrokenPipe(error)) {
        stdinError = error;
      }
    });
    child.stdin?.end(Buffer.from(buffer, byteOffset, byteLength));
  }

  const exitCode: number = await new Promise((resolve, reject) => {
    child.once('error', reject);
    child.once('close', (code) => resolve(code ?? -1));
  });

  const stdout = Buffer.concat(stdoutChunks);
  const stderr = Buffer.concat(stderrChunks);
  if (exitCode !== 0) {
    throw new CommandError(command, args, exitCode, stderr);
  }
  if (stdinError) {
    throw stdinError;
  }
  return { stdout, stderr, code: exitCode };
};
