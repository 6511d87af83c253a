import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'node:events';

vi.mock('node:child_process', () => {
  const spawn = vi.fn();
  return { spawn };
});

import { spawn } from 'node:child_process';
import { exec, spawnProcess } from '../../src/util/process.js';

const mockSpawn = spawn as unknown as ReturnType<typeof vi.fn>;

interface MockChild extends EventEmitter {
  killed: boolean;
  exitCode: number | null;
  signalCode: NodeJS.Signals | null;
  kill: ReturnType<typeof vi.fn>;
  stdout: EventEmitter;
  stderr: EventEmitter;
}

function makeMockChild(): MockChild {
  const child: MockChild = Object.assign(new EventEmitter(), {
    killed: false,
    exitCode: null,
    signalCode: null,
    kill: vi.fn(),
    stdout: new EventEmitter(),
    stderr: new EventEmitter(),
  });
  // Mirrors ChildProcess: `killed` turns true as soon as a signal is delivered
  child.kill.mockImplementation(() => {
    child.killed = true;
    return true;
  });
  return child;
}

function useChild(child: MockChild): void {
  mockSpawn.mockReturnValue(child);
}

describe('spawnProcess', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('collects stdout and stderr and resolves on close', async () => {
    const child = makeMockChild();
    useChild(child);

    const { promise } = spawnProcess('gh', ['issue', 'create'], { env: { GH_TOKEN: 'test-token' } });
    child.stdout.emit('data', Buffer.from('https://github.com/acme/widgets/'));
    child.stdout.emit('data', Buffer.from('issues/1\n'));
    child.stderr.emit('data', Buffer.from('warning'));
    child.emit('close', 0, null);

    await expect(promise).resolves.toEqual({
      exitCode: 0,
      stdout: 'https://github.com/acme/widgets/issues/1\n',
      stderr: 'warning',
      signal: null,
      timedOut: false,
    });
    expect(mockSpawn).toHaveBeenCalledWith('gh', ['issue', 'create'], {
      cwd: undefined,
      env: { GH_TOKEN: 'test-token' },
      stdio: ['ignore', 'pipe', 'pipe'],
    });
  });

  it('resolves with exit code 1 when the command cannot be started', async () => {
    const child = makeMockChild();
    useChild(child);

    const { promise } = spawnProcess('gh', ['auth', 'status']);
    child.emit('error', new Error('spawn gh ENOENT'));

    await expect(promise).resolves.toMatchObject({ exitCode: 1, stderr: 'spawn gh ENOENT', timedOut: false });
  });

  describe('timeouts', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('sends SIGTERM at the timeout and SIGKILL after the grace period', async () => {
      const child = makeMockChild();
      useChild(child);

      const { promise } = spawnProcess('gh', ['issue', 'create'], { timeout: 100 });

      vi.advanceTimersByTime(100);
      expect(child.kill).toHaveBeenCalledWith('SIGTERM');

      vi.advanceTimersByTime(5000);
      expect(child.kill).toHaveBeenCalledWith('SIGKILL');

      child.emit('close', null, 'SIGKILL');
      await expect(promise).resolves.toMatchObject({ exitCode: null, signal: 'SIGKILL', timedOut: true });
    });

    it('sends SIGKILL to a child that ignores SIGTERM and resolves without waiting for close', async () => {
      const child = makeMockChild();
      useChild(child);

      const { promise } = spawnProcess('gh', ['issue', 'create'], { timeout: 200 });
      child.stdout.emit('data', Buffer.from('partial'));

      vi.advanceTimersByTime(200);
      expect(child.killed).toBe(true);
      vi.advanceTimersByTime(5000);

      expect(child.kill.mock.calls).toEqual([['SIGTERM'], ['SIGKILL']]);
      await expect(promise).resolves.toEqual({
        exitCode: null,
        stdout: 'partial',
        stderr: '',
        signal: 'SIGKILL',
        timedOut: true,
      });
    });

    it('resolves after the grace period when the child exited but close never arrives', async () => {
      const child = makeMockChild();
      useChild(child);

      const { promise } = spawnProcess('gh', ['issue', 'create'], { timeout: 100 });
      vi.advanceTimersByTime(100);
      child.signalCode = 'SIGTERM';
      vi.advanceTimersByTime(5000);

      expect(child.kill).toHaveBeenCalledTimes(1);
      await expect(promise).resolves.toMatchObject({ exitCode: null, signal: 'SIGTERM', timedOut: true });
    });

    it('skips SIGKILL when the child already exited', async () => {
      const child = makeMockChild();
      useChild(child);

      const { promise } = spawnProcess('gh', ['issue', 'create'], { timeout: 100 });
      vi.advanceTimersByTime(100);
      child.emit('close', null, 'SIGTERM');
      vi.advanceTimersByTime(5000);

      expect(child.kill).toHaveBeenCalledTimes(1);
      await expect(promise).resolves.toMatchObject({ timedOut: true });
    });
  });
});

describe('exec', () => {
  it('resolves with the process result', async () => {
    const child = makeMockChild();
    useChild(child);

    const pending = exec('gh', ['--version']);
    child.stdout.emit('data', Buffer.from('gh version 2'));
    child.emit('close', 0, null);

    await expect(pending).resolves.toMatchObject({ exitCode: 0, stdout: 'gh version 2' });
  });
});
