/**
 * USB → Wi-Fi promotion sequence and the matching disconnect sequence
 *
 * Idle → WaitingForAuthorization → DiscoveringIP → EnablingWireless → Connecting
 *      → Connected | Failed | Cancelled
 *
 * Each adb call is queued on the shared executor, so a sequence step and a poll tick
 * never run at the same time. Waiting (authorization retries, settle delay) happens
 * outside the executor.
 */

import * as l10n from '@vscode/l10n';
import { AdbClient, DEFAULT_WIRELESS_PORT } from './AdbClient';
import { ConnectionSession } from './ConnectionSession';
import { ConnectOutcomeClassifier, defaultConnectOutcome, extractWifiIp } from './DeviceClassifier';
import { ProcessResult } from './ProcessRunner';
import { SerialExecutor } from './SerialExecutor';
import { DEFAULT_POLL_INTERVAL_MS, StatusPoller } from './StatusPoller';
import { DeviceRecord, isAuthorized, isWifi } from './types/DeviceState';
import { ErrorCode, QuestCastError } from './types/Errors';
import { PromotionState } from './types/SessionState';
import { ActionType } from './types/Actions';
import { Logger } from './Logger';

export const DEFAULT_SETTLE_DELAY_MS = 1000;

export interface WirelessPromotionConfig {
  port?: number;
  /** Delay between authorization checks */
  pollIntervalMs?: number;
  /** Time for adbd to start listening after `adb tcpip` */
  settleDelayMs?: number;
  /** Authorization checks before giving up. Unbounded when omitted. */
  maxAuthorizationAttempts?: number;
  connectOutcome?: ConnectOutcomeClassifier;
}

export interface PromotionOptions {
  signal?: AbortSignal;
  onStateChange?: (state: PromotionState) => void;
}

export type PromotionResult =
  | { status: 'connected'; serial: string; output: string }
  | { status: 'cancelled' };

class SequenceCancelled extends Error {}

/**
 * Resolves after `ms`, or as soon as `signal` aborts
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

export class WirelessPromotion {
  private readonly port: number;
  private readonly pollIntervalMs: number;
  private readonly settleDelayMs: number;
  private readonly maxAuthorizationAttempts: number;
  private readonly connectOutcome: ConnectOutcomeClassifier;
  // Bumped by every new sequence; older sequences drop their late results
  private generation = 0;
  private readonly logger = new Logger('WirelessPromotion');

  constructor(
    private readonly adb: AdbClient,
    private readonly session: ConnectionSession,
    private readonly executor: SerialExecutor,
    private readonly poller: StatusPoller,
    config: WirelessPromotionConfig = {}
  ) {
    this.port = config.port ?? DEFAULT_WIRELESS_PORT;
    this.pollIntervalMs = config.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.settleDelayMs = config.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS;
    this.maxAuthorizationAttempts = config.maxAuthorizationAttempts ?? Infinity;
    this.connectOutcome = config.connectOutcome ?? defaultConnectOutcome;
  }

  /**
   * Promote the attached device to a Wi-Fi connection.
   *
   * Rejects with a QuestCastError on failure; resolves with `cancelled` when the
   * signal aborts or a newer sequence starts. Device-side changes are not rolled back.
   */
  async promote(options: PromotionOptions = {}): Promise<PromotionResult> {
    const generation = ++this.generation;
    const { signal } = options;

    const isCurrent = () => generation === this.generation && !signal?.aborted;
    const setState = (state: PromotionState) => {
      if (generation !== this.generation) {
        return;
      }
      this.logger.debug(`→ ${state}`);
      this.session.dispatch({ type: ActionType.SET_PROMOTION_STATE, payload: { state } });
      options.onStateChange?.(state);
    };
    const ensureCurrent = () => {
      if (!isCurrent()) {
        throw new SequenceCancelled();
      }
    };
    const step = async (task: () => Promise<ProcessResult>): Promise<ProcessResult> => {
      const result = await this.executor.enqueue(task);
      ensureCurrent();
      return result;
    };

    try {
      setState(PromotionState.WAITING_FOR_AUTHORIZATION);
      const device = await this.waitForAuthorization(signal, ensureCurrent);

      setState(PromotionState.DISCOVERING_IP);
      const ipResult = await step(() => this.adb.queryWifiAddress(device.serial));
      const ip = extractWifiIp(ipResult.output);
      if (!ip) {
        throw new QuestCastError(
          ErrorCode.IP_DISCOVERY_FAILED,
          l10n.t('Could not find the Quest IP address'),
          ipResult.output.trim()
        );
      }
      this.logger.info(`Found Wi-Fi IP: ${ip}`);

      setState(PromotionState.ENABLING_WIRELESS);
      const tcpip = await step(() => this.adb.enableTcpip(this.port, device.serial));
      if (tcpip.exitCode !== 0) {
        throw new QuestCastError(
          ErrorCode.WIRELESS_ENABLE_FAILED,
          l10n.t('Could not switch the headset to wireless mode'),
          tcpip.output.trim()
        );
      }

      await sleep(this.settleDelayMs, signal);
      ensureCurrent();

      setState(PromotionState.CONNECTING);
      const address = `${ip}:${this.port}`;
      const connect = await step(() => this.adb.connect(address));
      const output = connect.output.trim();
      if (!this.connectOutcome(connect.output)) {
        throw new QuestCastError(
          ErrorCode.WIRELESS_CONNECT_FAILED,
          l10n.t('Failed to establish wireless connection'),
          output
        );
      }

      this.logger.info(`Connected to ${address}`);
      this.session.dispatch({ type: ActionType.SET_LAST_WIFI_SERIAL, payload: { serial: address } });
      setState(PromotionState.CONNECTED);
      await this.poller.refresh();

      return { status: 'connected', serial: address, output };
    } catch (error) {
      if (error instanceof SequenceCancelled) {
        this.logger.info('Wireless promotion cancelled');
        setState(PromotionState.CANCELLED);
        return { status: 'cancelled' };
      }
      this.logger.warn('Wireless promotion failed:', error instanceof Error ? error.message : error);
      setState(PromotionState.FAILED);
      throw error;
    }
  }

  /**
   * Re-poll until the device reports `device`, waiting one poll interval between checks
   */
  private async waitForAuthorization(
    signal: AbortSignal | undefined,
    ensureCurrent: () => void
  ): Promise<DeviceRecord> {
    let attempts = 0;

    for (;;) {
      const device = await this.poller.refresh();
      ensureCurrent();
      if (isAuthorized(device)) {
        return device;
      }

      attempts++;
      if (attempts >= this.maxAuthorizationAttempts) {
        throw new QuestCastError(
          ErrorCode.NOT_AUTHORIZED,
          l10n.t('The device was detected but access was not approved.')
        );
      }
      this.logger.debug(`Waiting for authorization (attempt ${attempts})`);

      await sleep(this.pollIntervalMs, signal);
      ensureCurrent();
    }
  }

  /**
   * Drop the Wi-Fi connection and put the device back in USB mode. Best-effort.
   */
  async demote(): Promise<void> {
    // Supersedes any promotion still running
    this.generation++;

    const device = await this.poller.refresh();
    if (isWifi(device) && device.serial) {
      const serial = device.serial;
      await this.bestEffort(`disconnect ${serial}`, () => this.adb.disconnect(serial));
    }
    await this.bestEffort('usb', () => this.adb.switchToUsb());

    this.session.dispatch({ type: ActionType.CLEAR_LAST_WIFI_SERIAL });
    this.session.dispatch({
      type: ActionType.SET_PROMOTION_STATE,
      payload: { state: PromotionState.IDLE },
    });
    await this.poller.refresh();
  }

  private async bestEffort(label: string, task: () => Promise<ProcessResult>): Promise<void> {
    try {
      const result = await this.executor.enqueue(task);
      this.logger.info(`adb ${label}: ${result.output.trim()}`);
    } catch (error) {
      this.logger.warn(`adb ${label} failed:`, error instanceof Error ? error.message : error);
    }
  }
}
