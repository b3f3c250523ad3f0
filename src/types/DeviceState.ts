/**
 * Device state types
 *
 * A DeviceRecord is the snapshot produced by one pass over `adb devices -l`.
 * Records are frozen and replaced wholesale by the next poll.
 */

/**
 * Channel the headset is reachable over
 */
export enum Transport {
  USB = 'usb',
  WIFI = 'wifi',
  UNKNOWN = 'unknown',
}

/**
 * Debugging authorization state as reported by adb.
 * Values are the raw adb state strings; UNKNOWN covers anything else.
 */
export enum AuthState {
  AUTHORIZED = 'device',
  UNAUTHORIZED = 'unauthorized',
  OFFLINE = 'offline',
  UNKNOWN = '',
}

/**
 * Snapshot of the canonical detected device
 */
export interface DeviceRecord {
  readonly transport: Transport;
  readonly authState: AuthState;
  /** USB serial number, or `ip:port` for Wi-Fi */
  readonly serial: string | null;
}

/**
 * Record returned when no device row is present
 */
export const UNKNOWN_DEVICE: DeviceRecord = Object.freeze({
  transport: Transport.UNKNOWN,
  authState: AuthState.UNKNOWN,
  serial: null,
});

export function createDeviceRecord(
  transport: Transport,
  authState: AuthState,
  serial: string | null
): DeviceRecord {
  if (serial === null) {
    return UNKNOWN_DEVICE;
  }
  return Object.freeze({ transport, authState, serial });
}

export function isWifi(device: DeviceRecord): boolean {
  return device.transport === Transport.WIFI;
}

export function isUsb(device: DeviceRecord): boolean {
  return device.transport === Transport.USB;
}

export function isAuthorized(device: DeviceRecord): boolean {
  return device.authState === AuthState.AUTHORIZED;
}

/**
 * Connected means adb sees the device in a usable or approvable state
 */
export function isConnected(device: DeviceRecord): boolean {
  return device.authState !== AuthState.UNKNOWN && device.authState !== AuthState.OFFLINE;
}

/**
 * Key for the status colour lookup: `wifi` for Wi-Fi, otherwise the adb state string
 */
export function getStatusKey(device: DeviceRecord): string {
  if (device.transport === Transport.WIFI) {
    return 'wifi';
  }
  return device.authState;
}

export function devicesEqual(a: DeviceRecord, b: DeviceRecord): boolean {
  return a.transport === b.transport && a.authState === b.authState && a.serial === b.serial;
}
