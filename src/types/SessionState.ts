/**
 * Connection session state types
 *
 * The session is the single source of truth for what the display shows.
 */

import { DeviceRecord } from './DeviceState';

/**
 * States of the USB → Wi-Fi promotion sequence
 */
export enum PromotionState {
  IDLE = 'idle',
  WAITING_FOR_AUTHORIZATION = 'waitingForAuthorization',
  DISCOVERING_IP = 'discoveringIp',
  ENABLING_WIRELESS = 'enablingWireless',
  CONNECTING = 'connecting',
  CONNECTED = 'connected',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

/**
 * Internal session state
 */
export interface SessionState {
  currentDevice: DeviceRecord;
  /** Last Wi-Fi serial seen or connected; survives polls that only show USB */
  lastWifiSerial: string | null;
  promotionState: PromotionState;
}

/**
 * Immutable snapshot handed to subscribers
 */
export type SessionSnapshot = Readonly<SessionState>;
