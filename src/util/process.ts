import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';

export interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
}

export interface SpawnOpts {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number;
}

/**
 * Runs a command to completion. Injected wherever a CLI is shelled out to so
 * tests can substitute a fake.
 */
export type CommandRunner = (command: string, args: string[], opts?: SpawnOpts) => Promise<ProcessResult>;

const KILL_GRACE_MS = 5000;

/**
 * Spawn a child process and collect its output.
 * Returns a ProcessResult when the process exits or times out.
 */
export function spawnProcess(
  command: string,
  args: string[],
  opts: SpawnOpts = {},
): { promise: Promise<ProcessResult>; process: ChildProcess } {
  const spawnOpts: SpawnOptions = {
    cwd: opts.cwd,
    env: opts.env,
    stdio: ['ignore', 'pipe', 'pipe'],
  };

  const child = spawn(command, args, spawnOpts);

  const promise = new Promise<ProcessResult>((resolve) => {
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let timedOut = false;
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;
    let killTimer: ReturnType<typeof setTimeout> | undefined;

    const finish = (result: {
      exitCode: number | null;
      signal: NodeJS.Signals | null;
      /** Replaces the collected stderr when set. */
      stderr?: string;
    }): void => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
      resolve({
        exitCode: result.exitCode,
        stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
        stderr: result.stderr ?? Buffer.concat(stderrChunks).toString('utf-8'),
        signal: result.signal,
        timedOut,
      });
    };

    if (opts.timeout && opts.timeout > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          // `killed` only records that a signal was sent, not that the child exited
          const running = child.exitCode === null && child.signalCode === null;
          if (running) {
            child.kill('SIGKILL');
          }
          // A grandchild holding the pipes can delay 'close' indefinitely
          finish({ exitCode: child.exitCode, signal: running ? 'SIGKILL' : child.signalCode });
        }, KILL_GRACE_MS);
      }, opts.timeout);
    }

    child.stdout?.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    child.on('close', (code, signal) => {
      finish({ exitCode: code, signal });
    });

    child.on('error', (err) => {
      finish({ exitCode: 1, signal: null, stderr: err.message });
    });
  });

  return { promise, process: child };
}

/**
 * Run a command and wait for the result. Convenience wrapper around spawnProcess.
 */
export const exec: CommandRunner = async (command, args, opts = {}) => {
  const { promise } = spawnProcess(command, args, opts);
  return promise;
};
