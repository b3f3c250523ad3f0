/**
 * The adb commands the helper needs, on top of a CommandRunner
 */

import { CommandRunner, DEFAULT_COMMAND_TIMEOUT_MS, ProcessResult } from './ProcessRunner';

export const DEFAULT_WIRELESS_PORT = 5555;
export const DEFAULT_WIRELESS_TIMEOUT_MS = 10000;

export interface AdbClientOptions {
  adbCommand: string;
  commandTimeoutMs?: number;
  /** `adb tcpip` restarts adbd on the device and can take longer than other commands */
  wirelessTimeoutMs?: number;
  wifiInterface?: string;
}

export class AdbClient {
  private readonly adbCommand: string;
  private readonly commandTimeoutMs: number;
  private readonly wirelessTimeoutMs: number;
  private readonly wifiInterface: string;

  constructor(
    private readonly runner: CommandRunner,
    options: AdbClientOptions
  ) {
    this.adbCommand = options.adbCommand;
    this.commandTimeoutMs = options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.wirelessTimeoutMs = options.wirelessTimeoutMs ?? DEFAULT_WIRELESS_TIMEOUT_MS;
    this.wifiInterface = options.wifiInterface ?? 'wlan0';
  }

  private exec(args: string[], serial?: string | null, timeoutMs?: number): Promise<ProcessResult> {
    const fullArgs = serial ? ['-s', serial, ...args] : args;
    return this.runner.run(this.adbCommand, fullArgs, timeoutMs ?? this.commandTimeoutMs);
  }

  /**
   * `adb devices -l`
   */
  async listDevices(): Promise<string> {
    const result = await this.exec(['devices', '-l']);
    return result.output;
  }

  /**
   * Output of `ip -f inet addr show wlan0` on the device
   */
  async queryWifiAddress(serial?: string | null): Promise<ProcessResult> {
    return this.exec(['shell', 'ip', '-f', 'inet', 'addr', 'show', this.wifiInterface], serial);
  }

  /**
   * Restart adbd on the device listening on TCP `port`
   */
  async enableTcpip(port: number, serial?: string | null): Promise<ProcessResult> {
    return this.exec(['tcpip', String(port)], serial, this.wirelessTimeoutMs);
  }

  async connect(address: string): Promise<ProcessResult> {
    return this.exec(['connect', address]);
  }

  async disconnect(address: string): Promise<ProcessResult> {
    return this.exec(['disconnect', address]);
  }

  /**
   * Restart adbd on the device in USB mode
   */
  async switchToUsb(): Promise<ProcessResult> {
    return this.exec(['usb']);
  }
}
