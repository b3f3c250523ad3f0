/**
 * Maps a DeviceRecord to what the status display shows
 */

import * as l10n from '@vscode/l10n';
import { AuthState, DeviceRecord, Transport, getStatusKey } from './types/DeviceState';

export type WirelessAction = 'connect' | 'disconnect';

export interface StatusView {
  text: string;
  color: string;
  wirelessAction: WirelessAction;
  wirelessEnabled: boolean;
}

const FALLBACK_COLOR = 'red';

export function presentStatus(
  device: DeviceRecord,
  statusColors: Readonly<Record<string, string>> = {}
): StatusView {
  const color = statusColors[getStatusKey(device)] ?? FALLBACK_COLOR;

  if (device.transport === Transport.WIFI && device.authState === AuthState.AUTHORIZED) {
    return {
      text: l10n.t('Meta Quest connected wirelessly'),
      color,
      wirelessAction: 'disconnect',
      wirelessEnabled: true,
    };
  }

  if (device.authState === AuthState.AUTHORIZED) {
    return {
      text: l10n.t('Meta Quest connected'),
      color,
      wirelessAction: 'connect',
      wirelessEnabled: device.transport === Transport.USB,
    };
  }

  if (device.authState === AuthState.UNAUTHORIZED) {
    return {
      text: l10n.t('Approve access on the headset (Always Allow)'),
      color,
      wirelessAction: 'connect',
      wirelessEnabled: false,
    };
  }

  return {
    text: l10n.t('Make sure the Quest is on and connected to the computer'),
    color,
    wirelessAction: 'connect',
    wirelessEnabled: false,
  };
}
