import { describe, it, expect } from 'vitest';
import {
  AuthState,
  Transport,
  UNKNOWN_DEVICE,
  createDeviceRecord,
  devicesEqual,
  getStatusKey,
  isAuthorized,
  isConnected,
  isUsb,
  isWifi,
} from '../../src/types/DeviceState';

describe('DeviceState', () => {
  it('should return the unknown record when there is no serial', () => {
    expect(createDeviceRecord(Transport.USB, AuthState.AUTHORIZED, null)).toBe(UNKNOWN_DEVICE);
  });

  it('should classify transport and authorization', () => {
    const wifi = createDeviceRecord(Transport.WIFI, AuthState.AUTHORIZED, '10.0.0.7:5555');
    const usb = createDeviceRecord(Transport.USB, AuthState.UNAUTHORIZED, '1WMHH0000000');

    expect(isWifi(wifi)).toBe(true);
    expect(isUsb(wifi)).toBe(false);
    expect(isUsb(usb)).toBe(true);
    expect(isAuthorized(wifi)).toBe(true);
    expect(isAuthorized(usb)).toBe(false);
  });

  it('should count unauthorized devices as connected but not offline ones', () => {
    expect(isConnected(createDeviceRecord(Transport.USB, AuthState.UNAUTHORIZED, 'A1'))).toBe(true);
    expect(isConnected(createDeviceRecord(Transport.USB, AuthState.OFFLINE, 'A1'))).toBe(false);
    expect(isConnected(UNKNOWN_DEVICE)).toBe(false);
  });

  it('should derive the status colour key', () => {
    expect(getStatusKey(createDeviceRecord(Transport.WIFI, AuthState.OFFLINE, '10.0.0.7:5555'))).toBe(
      'wifi'
    );
    expect(getStatusKey(createDeviceRecord(Transport.USB, AuthState.UNAUTHORIZED, 'A1'))).toBe(
      'unauthorized'
    );
    expect(getStatusKey(UNKNOWN_DEVICE)).toBe('');
  });

  it('should compare records by value', () => {
    const a = createDeviceRecord(Transport.USB, AuthState.AUTHORIZED, 'A1');
    const b = createDeviceRecord(Transport.USB, AuthState.AUTHORIZED, 'A1');

    expect(a).not.toBe(b);
    expect(devicesEqual(a, b)).toBe(true);
    expect(devicesEqual(a, UNKNOWN_DEVICE)).toBe(false);
  });
});
