import * as l10n from '@vscode/l10n';

/**
 * Error codes surfaced to the user
 */
export enum ErrorCode {
  LAUNCH_ERROR = 'LAUNCH_ERROR',
  TIMEOUT = 'TIMEOUT',
  IP_DISCOVERY_FAILED = 'IP_DISCOVERY_FAILED',
  WIRELESS_ENABLE_FAILED = 'WIRELESS_ENABLE_FAILED',
  WIRELESS_CONNECT_FAILED = 'WIRELESS_CONNECT_FAILED',
  NOT_AUTHORIZED = 'NOT_AUTHORIZED',
  NOT_CONNECTED = 'NOT_CONNECTED',
  UNKNOWN_LAUNCH_ERROR = 'UNKNOWN_LAUNCH_ERROR',
  CONFIG_INVALID = 'CONFIG_INVALID',
}

/**
 * Base error for everything the helper reports to the user
 */
export class QuestCastError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly detail?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'QuestCastError';
  }
}

/**
 * An external command did not finish within its timeout
 */
export class CommandTimeoutError extends QuestCastError {
  constructor(
    public readonly executable: string,
    public readonly timeoutMs: number
  ) {
    super(ErrorCode.TIMEOUT, `${executable} did not finish within ${timeoutMs} ms`);
    this.name = 'CommandTimeoutError';
  }
}

/**
 * An executable could not be found or started
 */
export class LaunchError extends QuestCastError {
  constructor(
    public readonly executable: string,
    cause?: unknown
  ) {
    super(ErrorCode.LAUNCH_ERROR, `Could not start ${executable}`, undefined, { cause });
    this.name = 'LaunchError';
  }
}

/**
 * User-facing description of an error
 */
export interface ErrorDescription {
  title: string;
  message: string;
  remedy?: string;
}

/**
 * Translate an error into a localized title, message and suggested remedy
 */
export function describeError(error: unknown): ErrorDescription {
  if (!(error instanceof QuestCastError)) {
    const message = error instanceof Error ? error.message : String(error);
    return { title: l10n.t('Error'), message };
  }

  switch (error.code) {
    case ErrorCode.LAUNCH_ERROR:
      return {
        title: l10n.t('Missing tool'),
        message: error.message,
        remedy: l10n.t('Install adb and scrcpy, or set adbPath/scrcpyPath in the settings file.'),
      };
    case ErrorCode.TIMEOUT:
      return {
        title: l10n.t('Timed out'),
        message: error.message,
        remedy: l10n.t('Reconnect the cable and try again.'),
      };
    case ErrorCode.IP_DISCOVERY_FAILED:
      return {
        title: l10n.t('Error'),
        message: l10n.t('Could not find the Quest IP address'),
        remedy: l10n.t('Make sure the headset is connected to a Wi-Fi network.'),
      };
    case ErrorCode.WIRELESS_ENABLE_FAILED:
      return {
        title: l10n.t('Wireless connection failed'),
        message: l10n.t('Could not switch the headset to wireless mode'),
        remedy: l10n.t('Reconnect the cable and try again.'),
      };
    case ErrorCode.WIRELESS_CONNECT_FAILED:
      return {
        title: l10n.t('Wireless connection failed'),
        message: error.detail
          ? l10n.t('Failed to establish wireless connection: {0}', error.detail)
          : l10n.t('Failed to establish wireless connection'),
        remedy: l10n.t('Ensure the headset and computer are on the same Wi-Fi network.'),
      };
    case ErrorCode.NOT_AUTHORIZED:
      return {
        title: l10n.t('No access'),
        message: l10n.t('The device was detected but access was not approved.'),
        remedy: l10n.t("Put on the headset and select 'Always Allow'."),
      };
    case ErrorCode.NOT_CONNECTED:
      return {
        title: l10n.t('Device not connected'),
        message: l10n.t('No Quest device detected.'),
        remedy: l10n.t('Make sure the Quest is connected and in developer mode.'),
      };
    case ErrorCode.UNKNOWN_LAUNCH_ERROR:
      return {
        title: l10n.t('Cast failed'),
        message: l10n.t('Failed to start casting: {0}', error.detail ?? error.message),
        remedy: l10n.t('Check that scrcpy runs from a terminal.'),
      };
    case ErrorCode.CONFIG_INVALID:
      return {
        title: l10n.t('Invalid settings'),
        message: error.detail ? `${error.message}\n${error.detail}` : error.message,
        remedy: l10n.t('Fix the settings file or delete it to restore the defaults.'),
      };
  }
}
