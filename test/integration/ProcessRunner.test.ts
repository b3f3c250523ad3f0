import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  ExecFileCallback,
  MockChildProcess,
  createExecError,
  execFile,
  getLastMockProcess,
  resetMocks as resetChildProcessMocks,
  spawn,
} from '../mocks/child_process';

// Mock child_process module before importing ProcessRunner
vi.mock('child_process', () => import('../mocks/child_process'));

// Import after mocks are set up
import { ProcessRunner, toLaunchFailure } from '../../src/ProcessRunner';
import { CommandTimeoutError, ErrorCode, LaunchError } from '../../src/types/Errors';

function mockExecFile(
  error: ReturnType<typeof createExecError> | null,
  stdout: string,
  stderr = ''
): void {
  execFile.mockImplementation(
    (_file: string, _args: readonly string[], _options: unknown, callback?: ExecFileCallback) => {
      callback?.(error, stdout, stderr);
      return new MockChildProcess();
    }
  );
}

describe('ProcessRunner', () => {
  let runner: ProcessRunner;

  beforeEach(() => {
    resetChildProcessMocks();
    vi.clearAllMocks();
    runner = new ProcessRunner();
  });

  describe('run', () => {
    it('should resolve with stdout followed by stderr', async () => {
      mockExecFile(null, 'List of devices attached\n', '* daemon started successfully\n');

      const result = await runner.run('adb', ['devices', '-l']);

      expect(result).toEqual({
        exitCode: 0,
        output: 'List of devices attached\n* daemon started successfully\n',
      });
    });

    it('should pass the timeout to execFile', async () => {
      mockExecFile(null, '');

      await runner.run('adb', ['tcpip', '5555'], 10000);

      expect(execFile).toHaveBeenCalledWith(
        'adb',
        ['tcpip', '5555'],
        { timeout: 10000, windowsHide: true },
        expect.any(Function)
      );
    });

    it('should default the timeout to 4000 ms', async () => {
      mockExecFile(null, '');

      await runner.run('adb', ['devices']);

      expect(execFile).toHaveBeenCalledWith(
        'adb',
        ['devices'],
        { timeout: 4000, windowsHide: true },
        expect.any(Function)
      );
    });

    it('should resolve a nonzero exit instead of rejecting', async () => {
      mockExecFile(
        createExecError('Command failed: adb tcpip 5555', { code: 1 }),
        '',
        'error: no devices/emulators found\n'
      );

      const result = await runner.run('adb', ['tcpip', '5555']);

      expect(result).toEqual({ exitCode: 1, output: 'error: no devices/emulators found\n' });
    });

    it('should reject with LaunchError when the executable is missing', async () => {
      mockExecFile(createExecError('spawn adb ENOENT', { code: 'ENOENT' }), '');

      const promise = runner.run('adb', ['devices']);

      await expect(promise).rejects.toBeInstanceOf(LaunchError);
      await expect(promise).rejects.toMatchObject({ code: ErrorCode.LAUNCH_ERROR });
    });

    it('should reject with LaunchError when the executable is not permitted', async () => {
      mockExecFile(createExecError('spawn adb EACCES', { code: 'EACCES' }), '');

      await expect(runner.run('adb', ['devices'])).rejects.toBeInstanceOf(LaunchError);
    });

    it('should reject with CommandTimeoutError when the process is killed', async () => {
      mockExecFile(createExecError('Command failed', { killed: true }), 'partial');

      const promise = runner.run('adb', ['shell', 'ip', 'addr'], 4000);

      await expect(promise).rejects.toBeInstanceOf(CommandTimeoutError);
      await expect(promise).rejects.toThrow('adb did not finish within 4000 ms');
    });

    it('should not treat a maxBuffer kill as a timeout', async () => {
      mockExecFile(
        createExecError('stdout maxBuffer length exceeded', {
          code: 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER',
          killed: true,
        }),
        'lots of output'
      );

      const result = await runner.run('adb', ['logcat', '-d']);

      expect(result).toEqual({ exitCode: 1, output: 'lots of output' });
    });
  });

  describe('spawnDetached', () => {
    it('should resolve with the pid once the process has started', async () => {
      const promise = runner.spawnDetached('scrcpy', ['-s', '10.0.0.7:5555'], { cwd: '/opt/scrcpy' });
      const child = getLastMockProcess();
      child?.simulateSpawn();

      await expect(promise).resolves.toBe(4242);
      expect(child?.unref).toHaveBeenCalledTimes(1);
      expect(spawn).toHaveBeenCalledWith('scrcpy', ['-s', '10.0.0.7:5555'], {
        cwd: '/opt/scrcpy',
        detached: true,
        stdio: 'ignore',
        windowsHide: true,
      });
    });

    it('should reject with LaunchError when scrcpy is missing', async () => {
      const promise = runner.spawnDetached('scrcpy', []);
      getLastMockProcess()?.simulateError(
        createExecError('spawn scrcpy ENOENT', { code: 'ENOENT' })
      );

      await expect(promise).rejects.toBeInstanceOf(LaunchError);
    });

    it('should reject with an unknown launch error for anything else', async () => {
      const promise = runner.spawnDetached('scrcpy', []);
      getLastMockProcess()?.simulateError(new Error('spawn scrcpy E2BIG'));

      await expect(promise).rejects.toMatchObject({
        code: ErrorCode.UNKNOWN_LAUNCH_ERROR,
        message: 'Failed to start scrcpy',
        detail: 'spawn scrcpy E2BIG',
      });
    });

    it('should reject when spawn throws synchronously', async () => {
      spawn.mockImplementationOnce(() => {
        throw createExecError('spawn EINVAL', { code: 'EINVAL' });
      });

      await expect(runner.spawnDetached('scrcpy', [])).rejects.toMatchObject({
        code: ErrorCode.UNKNOWN_LAUNCH_ERROR,
      });
    });
  });

  describe('toLaunchFailure', () => {
    it('should map permission errors to LaunchError', () => {
      const failure = toLaunchFailure('scrcpy', createExecError('denied', { code: 'EPERM' }));

      expect(failure).toBeInstanceOf(LaunchError);
    });

    it('should stringify non-error values', () => {
      const failure = toLaunchFailure('scrcpy', 'weird');

      expect(failure.code).toBe(ErrorCode.UNKNOWN_LAUNCH_ERROR);
      expect(failure.detail).toBe('weird');
    });
  });
});
