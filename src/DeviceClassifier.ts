/**
 * Parsing of adb text output. Everything here is pure.
 */

import { AuthState, DeviceRecord, Transport, UNKNOWN_DEVICE, createDeviceRecord } from './types/DeviceState';

/**
 * Decides whether `adb connect` output means the connection succeeded
 */
export type ConnectOutcomeClassifier = (output: string) => boolean;

/**
 * Wi-Fi serials are `host:port`; USB serials never contain a colon
 */
export function isWifiSerial(serial: string): boolean {
  return serial.includes(':');
}

/**
 * Map an adb state string to AuthState. Unrecognized states map to UNKNOWN.
 */
export function parseAuthState(raw: string): AuthState {
  switch (raw) {
    case 'device':
      return AuthState.AUTHORIZED;
    case 'unauthorized':
      return AuthState.UNAUTHORIZED;
    case 'offline':
      return AuthState.OFFLINE;
    default:
      return AuthState.UNKNOWN;
  }
}

/**
 * Split `adb devices -l` output into [serial, state] rows, skipping the header
 * and anything with fewer than two tokens
 */
function parseRows(output: string): Array<[string, string]> {
  const lines = output.split(/\r?\n/);
  const rows: Array<[string, string]> = [];

  for (let i = 1; i < lines.length; i++) {
    const line = lines[i].trim();
    // A cold adb server prints "* daemon ..." notices, pushing the header down
    if (line.startsWith('*') || line.startsWith('List of devices')) {
      continue;
    }
    const parts = line.split(/\s+/);
    if (parts.length < 2) {
      continue;
    }
    rows.push([parts[0], parts[1]]);
  }

  return rows;
}

/**
 * Reduce `adb devices -l` output to the one device the helper cares about.
 *
 * The first Wi-Fi row and the first USB row are kept; the Wi-Fi row wins when both
 * are present so a user who went wireless sees wireless status with the cable still in.
 */
export function classifyDevices(output: string): DeviceRecord {
  let wifi: DeviceRecord | null = null;
  let usb: DeviceRecord | null = null;

  for (const [serial, state] of parseRows(output)) {
    const authState = parseAuthState(state);
    if (isWifiSerial(serial)) {
      wifi ??= createDeviceRecord(Transport.WIFI, authState, serial);
    } else {
      usb ??= createDeviceRecord(Transport.USB, authState, serial);
    }
  }

  return wifi ?? usb ?? UNKNOWN_DEVICE;
}

/**
 * Extract the IPv4 address from `ip -f inet addr show wlan0` output
 */
export function extractWifiIp(output: string): string | null {
  const match = output.match(/inet\s+(\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3})/);
  return match ? match[1] : null;
}

/**
 * adb prints "connected to <addr>" or "already connected to <addr>" on success
 */
export const defaultConnectOutcome: ConnectOutcomeClassifier = (output) => {
  const text = output.toLowerCase();
  return text.includes('connected') || text.includes('already connected');
};
