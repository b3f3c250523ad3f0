/**
 * Application service: one session, one executor, and the components that share them
 */

import { AdbClient } from './AdbClient';
import { CastLauncher, LaunchResult } from './CastLauncher';
import { ConnectionSession, Unsubscribe } from './ConnectionSession';
import { Settings } from './config/Settings';
import { CommandRunner, ProcessRunner } from './ProcessRunner';
import { SerialExecutor } from './SerialExecutor';
import { StatusPoller } from './StatusPoller';
import { StatusView, presentStatus } from './StatusPresenter';
import { resolveExecutable } from './ToolChecker';
import { DeviceRecord, isWifi } from './types/DeviceState';
import { PromotionOptions, PromotionResult, WirelessPromotion } from './WirelessPromotion';
import { Logger } from './Logger';

export type StatusListener = (device: DeviceRecord, view: StatusView) => void;

export type ToggleResult = 'connected' | 'disconnected' | 'cancelled';

export class QuestCaster {
  readonly session = new ConnectionSession();
  private readonly executor = new SerialExecutor();
  private readonly adb: AdbClient;
  private readonly poller: StatusPoller;
  private readonly promotion: WirelessPromotion;
  private readonly launcher: CastLauncher;
  private readonly statusListeners = new Set<StatusListener>();
  private readonly logger = new Logger('QuestCaster');

  constructor(
    private readonly settings: Settings,
    runner: CommandRunner = new ProcessRunner()
  ) {
    this.adb = new AdbClient(runner, {
      adbCommand: resolveExecutable('adb', settings.adbPath),
      commandTimeoutMs: settings.commandTimeoutMs,
      wirelessTimeoutMs: settings.wirelessTimeoutMs,
    });
    this.poller = new StatusPoller(
      this.adb,
      this.session,
      this.executor,
      (device) => this.notifyStatus(device),
      settings.pollIntervalMs
    );
    this.promotion = new WirelessPromotion(this.adb, this.session, this.executor, this.poller, {
      port: settings.wirelessPort,
      pollIntervalMs: settings.pollIntervalMs,
      settleDelayMs: settings.settleDelayMs,
      maxAuthorizationAttempts: settings.maxAuthorizationAttempts,
    });
    // scrcpy looks for scrcpy-server next to itself
    this.launcher = new CastLauncher(
      runner,
      resolveExecutable('scrcpy', settings.scrcpyPath),
      settings.scrcpyPath
    );
  }

  /**
   * Listen for every classified poll result, rendered for display
   */
  onStatus(listener: StatusListener): Unsubscribe {
    this.statusListeners.add(listener);
    return () => {
      this.statusListeners.delete(listener);
    };
  }

  private notifyStatus(device: DeviceRecord): void {
    const view = presentStatus(device, this.settings.statusColors);
    for (const listener of this.statusListeners) {
      listener(device, view);
    }
  }

  refresh(): Promise<DeviceRecord> {
    return this.poller.refresh();
  }

  startWatching(): void {
    this.poller.start();
  }

  stopWatching(): Promise<void> {
    return this.poller.stop();
  }

  connectWireless(options: PromotionOptions = {}): Promise<PromotionResult> {
    return this.promotion.promote(options);
  }

  disconnectWireless(): Promise<void> {
    return this.promotion.demote();
  }

  /**
   * Disconnect when the device is on Wi-Fi, otherwise promote it
   */
  async toggleWireless(options: PromotionOptions = {}): Promise<ToggleResult> {
    const device = await this.refresh();
    if (isWifi(device)) {
      await this.disconnectWireless();
      return 'disconnected';
    }
    const result = await this.connectWireless(options);
    return result.status;
  }

  /**
   * Launch scrcpy. A Wi-Fi row in a fresh listing wins, then the last Wi-Fi serial
   * this session saw, then the polled device.
   */
  async cast(): Promise<LaunchResult> {
    const device = await this.refresh();
    const wifiSerial = isWifi(device) ? device.serial : this.session.getLastWifiSerial();
    this.logger.info(`Casting to ${wifiSerial ?? device.serial ?? 'default device'}`);
    return this.launcher.launch(device, wifiSerial, this.settings.mirror);
  }

  /**
   * Stop polling and wait for adb commands already queued
   */
  async dispose(): Promise<void> {
    this.statusListeners.clear();
    await this.poller.stop();
    await this.executor.whenIdle();
  }
}
