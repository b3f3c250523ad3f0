/**
 * Process-wide connection session
 *
 * Owns the latest DeviceRecord and the last known Wi-Fi serial. State only changes
 * through dispatched actions; subscribers receive complete snapshots.
 */

import { DeviceRecord, UNKNOWN_DEVICE, devicesEqual, isWifi } from './types/DeviceState';
import { PromotionState, SessionSnapshot, SessionState } from './types/SessionState';
import { ActionType, SessionAction } from './types/Actions';
import { Logger } from './Logger';

/**
 * Listener function type for state changes
 */
export type SessionListener = (snapshot: SessionSnapshot) => void;

/**
 * Unsubscribe function type
 */
export type Unsubscribe = () => void;

export class ConnectionSession {
  private state: SessionState = {
    currentDevice: UNKNOWN_DEVICE,
    lastWifiSerial: null,
    promotionState: PromotionState.IDLE,
  };
  private listeners = new Set<SessionListener>();
  private notifyScheduled = false;
  private readonly logger = new Logger('ConnectionSession');

  /**
   * Dispatch an action to update the state
   */
  dispatch(action: SessionAction): void {
    if (this.reducer(action)) {
      this.notifyListeners();
    }
  }

  /**
   * Returns true if state was modified
   */
  private reducer(action: SessionAction): boolean {
    switch (action.type) {
      case ActionType.UPDATE_DEVICE: {
        const device = action.payload;
        let changed = !devicesEqual(this.state.currentDevice, device);
        this.state.currentDevice = device;

        // Remember the Wi-Fi serial; a later USB-only poll does not clear it
        if (isWifi(device) && device.serial && device.serial !== this.state.lastWifiSerial) {
          this.state.lastWifiSerial = device.serial;
          changed = true;
        }
        return changed;
      }
      case ActionType.SET_LAST_WIFI_SERIAL: {
        if (this.state.lastWifiSerial !== action.payload.serial) {
          this.state.lastWifiSerial = action.payload.serial;
          return true;
        }
        return false;
      }
      case ActionType.CLEAR_LAST_WIFI_SERIAL: {
        if (this.state.lastWifiSerial !== null) {
          this.state.lastWifiSerial = null;
          return true;
        }
        return false;
      }
      case ActionType.SET_PROMOTION_STATE: {
        if (this.state.promotionState !== action.payload.state) {
          this.state.promotionState = action.payload.state;
          return true;
        }
        return false;
      }
    }
  }

  getSnapshot(): SessionSnapshot {
    return Object.freeze({ ...this.state });
  }

  /**
   * Subscribe to state changes
   * @returns Unsubscribe function
   */
  subscribe(listener: SessionListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Notify all listeners of state change
   * Uses microtask scheduling to batch multiple mutations
   */
  private notifyListeners(): void {
    if (this.notifyScheduled) {
      return;
    }
    this.notifyScheduled = true;

    queueMicrotask(() => {
      this.notifyScheduled = false;
      const snapshot = this.getSnapshot();
      this.listeners.forEach((listener) => {
        try {
          listener(snapshot);
        } catch (error) {
          this.logger.error('Error in session listener:', error);
        }
      });
    });
  }

  // ==================== Read-Only Accessors ====================

  getCurrentDevice(): DeviceRecord {
    return this.state.currentDevice;
  }

  getLastWifiSerial(): string | null {
    return this.state.lastWifiSerial;
  }

  getPromotionState(): PromotionState {
    return this.state.promotionState;
  }
}
