import { DeviceRecord } from './DeviceState';
import { PromotionState } from './SessionState';

export enum ActionType {
  UPDATE_DEVICE = 'UPDATE_DEVICE',
  SET_LAST_WIFI_SERIAL = 'SET_LAST_WIFI_SERIAL',
  CLEAR_LAST_WIFI_SERIAL = 'CLEAR_LAST_WIFI_SERIAL',
  SET_PROMOTION_STATE = 'SET_PROMOTION_STATE',
}

export interface UpdateDeviceAction {
  type: ActionType.UPDATE_DEVICE;
  payload: DeviceRecord;
}

export interface SetLastWifiSerialAction {
  type: ActionType.SET_LAST_WIFI_SERIAL;
  payload: { serial: string };
}

export interface ClearLastWifiSerialAction {
  type: ActionType.CLEAR_LAST_WIFI_SERIAL;
}

export interface SetPromotionStateAction {
  type: ActionType.SET_PROMOTION_STATE;
  payload: { state: PromotionState };
}

export type SessionAction =
  | UpdateDeviceAction
  | SetLastWifiSerialAction
  | ClearLastWifiSerialAction
  | SetPromotionStateAction;
