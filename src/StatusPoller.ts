/**
 * Status polling loop
 *
 * Each tick lists devices, classifies the output, stores the record in the session
 * and hands it to the display callback. The next tick is scheduled only after the
 * current one has finished, so classification passes never overlap.
 */

import { AdbClient } from './AdbClient';
import { ConnectionSession } from './ConnectionSession';
import { classifyDevices } from './DeviceClassifier';
import { SerialExecutor } from './SerialExecutor';
import { DeviceRecord, UNKNOWN_DEVICE } from './types/DeviceState';
import { ActionType } from './types/Actions';
import { Logger } from './Logger';

export const DEFAULT_POLL_INTERVAL_MS = 2000;

export type DisplayCallback = (device: DeviceRecord) => void;

export class StatusPoller {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  // Bumped by start() and stop(); a loop from an earlier run exits instead of rescheduling
  private runId = 0;
  private inFlight: Promise<DeviceRecord> | null = null;
  private readonly logger = new Logger('StatusPoller');

  constructor(
    private readonly adb: AdbClient,
    private readonly session: ConnectionSession,
    private readonly executor: SerialExecutor,
    private readonly display: DisplayCallback,
    private readonly intervalMs: number = DEFAULT_POLL_INTERVAL_MS
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Start polling. The first tick runs immediately.
   */
  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    const run = ++this.runId;
    this.logger.debug(`Polling every ${this.intervalMs} ms`);
    void this.loop(run);
  }

  /**
   * Stop scheduling ticks and wait for the one in flight, if any
   */
  async stop(): Promise<void> {
    this.running = false;
    this.runId++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  /**
   * Poll once, outside the schedule. Queued behind any running sequence step.
   */
  refresh(): Promise<DeviceRecord> {
    return this.executor.enqueue(() => this.pollNow());
  }

  /**
   * Poll once on the caller's turn of the executor. Only call from an enqueued task.
   */
  async pollNow(): Promise<DeviceRecord> {
    let device: DeviceRecord;
    try {
      device = classifyDevices(await this.adb.listDevices());
    } catch (error) {
      // A bad poll is superseded by the next one
      this.logger.warn('Device listing failed:', error instanceof Error ? error.message : error);
      device = UNKNOWN_DEVICE;
    }

    this.session.dispatch({ type: ActionType.UPDATE_DEVICE, payload: device });

    try {
      this.display(device);
    } catch (error) {
      this.logger.error('Error in display callback:', error);
    }
    return device;
  }

  private async loop(run: number): Promise<void> {
    if (run !== this.runId) {
      return;
    }

    const tick = this.refresh();
    this.inFlight = tick;
    try {
      await tick;
    } finally {
      if (this.inFlight === tick) {
        this.inFlight = null;
      }
    }

    if (run === this.runId) {
      this.timer = setTimeout(() => {
        this.timer = null;
        void this.loop(run);
      }, this.intervalMs);
    }
  }
}
