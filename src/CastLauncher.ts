/**
 * Launches scrcpy against the resolved device.
 *
 * A Wi-Fi serial always wins over the polled serial, and its presence skips the
 * authorization check: the poll may still show the USB row while a Wi-Fi session works.
 */

import { MirrorConfig } from './config/Settings';
import { CommandRunner } from './ProcessRunner';
import { AuthState, DeviceRecord, isAuthorized } from './types/DeviceState';
import { ErrorCode, QuestCastError } from './types/Errors';
import * as l10n from '@vscode/l10n';

/**
 * A launch request, fixed at the moment `launch` is called
 */
export interface CastInvocation {
  readonly serial: string | null;
  readonly args: readonly string[];
  readonly config: Readonly<MirrorConfig>;
}

export interface LaunchResult {
  pid: number | undefined;
  invocation: CastInvocation;
}

/**
 * scrcpy arguments for `config`, with a `-s` selector when a serial is given
 */
export function buildScrcpyArgs(config: MirrorConfig, serial?: string | null): string[] {
  const args: string[] = [];

  if (serial) {
    args.push('-s', serial);
  }

  args.push(
    '--render-driver',
    config.renderDriver,
    '--crop',
    config.crop,
    '-b',
    config.bitrate,
    '--max-size',
    String(config.maxSize),
    '--video-codec',
    config.videoCodec,
    '--video-encoder',
    config.videoEncoder
  );

  if (config.noAudio) {
    args.push('--no-audio');
  }
  if (config.noControl) {
    args.push('-n');
  }

  return args;
}

/**
 * Reject launches that cannot work: no Wi-Fi target and the device is not authorized
 */
export function validateCastTarget(device: DeviceRecord, preferredWifiSerial?: string | null): void {
  if (preferredWifiSerial) {
    return;
  }
  if (device.authState === AuthState.UNAUTHORIZED) {
    throw new QuestCastError(
      ErrorCode.NOT_AUTHORIZED,
      l10n.t('The device was detected but access was not approved.')
    );
  }
  if (!isAuthorized(device)) {
    throw new QuestCastError(ErrorCode.NOT_CONNECTED, l10n.t('No Quest device detected.'));
  }
}

export class CastLauncher {
  constructor(
    private readonly runner: CommandRunner,
    private readonly scrcpyCommand: string,
    private readonly cwd?: string
  ) {}

  /**
   * Validate, build the invocation and spawn scrcpy detached. Its exit is not awaited.
   */
  async launch(
    device: DeviceRecord,
    preferredWifiSerial: string | null | undefined,
    config: MirrorConfig
  ): Promise<LaunchResult> {
    validateCastTarget(device, preferredWifiSerial);

    const serial = preferredWifiSerial || device.serial;
    const snapshot = Object.freeze({ ...config });
    const invocation: CastInvocation = Object.freeze({
      serial,
      args: Object.freeze(buildScrcpyArgs(snapshot, serial)),
      config: snapshot,
    });

    const pid = await this.runner.spawnDetached(this.scrcpyCommand, [...invocation.args], {
      cwd: this.cwd,
    });
    return { pid, invocation };
  }
}
