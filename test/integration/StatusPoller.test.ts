import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { AdbClient } from '../../src/AdbClient';
import { ConnectionSession } from '../../src/ConnectionSession';
import { SerialExecutor } from '../../src/SerialExecutor';
import { StatusPoller } from '../../src/StatusPoller';
import { AuthState, Transport, UNKNOWN_DEVICE } from '../../src/types/DeviceState';
import { CommandTimeoutError } from '../../src/types/Errors';
import { FakeRunner, ok } from '../helpers/FakeRunner';

const USB_LISTING = 'List of devices attached\n1WMHH0000000\tdevice\n';
const WIFI_LISTING = 'List of devices attached\n10.0.0.7:5555\tdevice\n1WMHH0000000\tdevice\n';

describe('StatusPoller', () => {
  let runner: FakeRunner;
  let session: ConnectionSession;
  let executor: SerialExecutor;
  let display: ReturnType<typeof vi.fn>;
  let poller: StatusPoller;

  beforeEach(() => {
    runner = new FakeRunner().devices(USB_LISTING);
    session = new ConnectionSession();
    executor = new SerialExecutor();
    display = vi.fn();
    poller = new StatusPoller(
      new AdbClient(runner, { adbCommand: 'adb', commandTimeoutMs: 4000 }),
      session,
      executor,
      display,
      2000
    );
  });

  afterEach(async () => {
    await poller.stop();
    vi.useRealTimers();
  });

  describe('refresh', () => {
    it('should classify the listing, store it and display it', async () => {
      const device = await poller.refresh();

      expect(device).toEqual({
        transport: Transport.USB,
        authState: AuthState.AUTHORIZED,
        serial: '1WMHH0000000',
      });
      expect(session.getCurrentDevice()).toBe(device);
      expect(display).toHaveBeenCalledWith(device);
      expect(runner.calls[0]).toEqual({
        executable: 'adb',
        args: ['devices', '-l'],
        timeoutMs: 4000,
      });
    });

    it('should remember the Wi-Fi serial from the listing', async () => {
      runner.devices(WIFI_LISTING);

      await poller.refresh();

      expect(session.getLastWifiSerial()).toBe('10.0.0.7:5555');
    });

    it('should report an unknown device when adb fails', async () => {
      runner.on('devices', () => {
        throw new CommandTimeoutError('adb', 4000);
      });

      const device = await poller.refresh();

      expect(device).toBe(UNKNOWN_DEVICE);
      expect(session.getCurrentDevice()).toBe(UNKNOWN_DEVICE);
      expect(display).toHaveBeenCalledWith(UNKNOWN_DEVICE);
    });

    it('should survive a throwing display callback', async () => {
      display.mockImplementation(() => {
        throw new Error('render failed');
      });

      await expect(poller.refresh()).resolves.toMatchObject({ serial: '1WMHH0000000' });
    });
  });

  describe('start / stop', () => {
    it('should poll immediately and then once per interval', async () => {
      vi.useFakeTimers();

      poller.start();
      await vi.advanceTimersByTimeAsync(0);
      expect(runner.run).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(2000);
      expect(runner.run).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(4000);
      expect(runner.run).toHaveBeenCalledTimes(4);
    });

    it('should wait for a slow tick before scheduling the next', async () => {
      vi.useFakeTimers();
      runner.on(
        'devices',
        () => new Promise((resolve) => setTimeout(() => resolve(ok(USB_LISTING)), 5000))
      );

      poller.start();
      await vi.advanceTimersByTimeAsync(4000);
      expect(runner.run).toHaveBeenCalledTimes(1);

      // Tick finishes at 5000, next one is due at 7000
      await vi.advanceTimersByTimeAsync(2500);
      expect(runner.run).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(500);
      expect(runner.run).toHaveBeenCalledTimes(2);

      const stopped = poller.stop();
      await vi.advanceTimersByTimeAsync(5000);
      await stopped;
      expect(runner.run).toHaveBeenCalledTimes(2);
    });

    it('should stop scheduling after stop', async () => {
      vi.useFakeTimers();

      poller.start();
      await vi.advanceTimersByTimeAsync(0);
      await poller.stop();
      await vi.advanceTimersByTimeAsync(10000);

      expect(runner.run).toHaveBeenCalledTimes(1);
      expect(poller.isRunning).toBe(false);
    });

    it('should run a single loop when restarted before stop settles', async () => {
      vi.useFakeTimers();

      poller.start();
      const stopped = poller.stop();
      poller.start();
      await stopped;
      await vi.advanceTimersByTimeAsync(0);
      expect(runner.run).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(10000);
      expect(runner.run).toHaveBeenCalledTimes(7);
    });

    it('should ignore a second start', async () => {
      vi.useFakeTimers();

      poller.start();
      poller.start();
      await vi.advanceTimersByTimeAsync(0);

      expect(runner.run).toHaveBeenCalledTimes(1);
    });
  });
});
