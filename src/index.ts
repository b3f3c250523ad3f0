export { AdbClient, DEFAULT_WIRELESS_PORT, DEFAULT_WIRELESS_TIMEOUT_MS } from './AdbClient';
export type { AdbClientOptions } from './AdbClient';
export { CastLauncher, buildScrcpyArgs, validateCastTarget } from './CastLauncher';
export type { CastInvocation, LaunchResult } from './CastLauncher';
export { ConnectionSession } from './ConnectionSession';
export type { SessionListener, Unsubscribe } from './ConnectionSession';
export {
  classifyDevices,
  defaultConnectOutcome,
  extractWifiIp,
  isWifiSerial,
  parseAuthState,
} from './DeviceClassifier';
export type { ConnectOutcomeClassifier } from './DeviceClassifier';
export { Logger, getLogLevel, setLogLevel } from './Logger';
export type { LogLevel } from './Logger';
export { DEFAULT_COMMAND_TIMEOUT_MS, ProcessRunner, toLaunchFailure } from './ProcessRunner';
export type { CommandRunner, DetachedSpawnOptions, ProcessResult } from './ProcessRunner';
export { QuestCaster } from './QuestCaster';
export type { StatusListener, ToggleResult } from './QuestCaster';
export { SerialExecutor } from './SerialExecutor';
export { DEFAULT_POLL_INTERVAL_MS, StatusPoller } from './StatusPoller';
export type { DisplayCallback } from './StatusPoller';
export { presentStatus } from './StatusPresenter';
export type { StatusView, WirelessAction } from './StatusPresenter';
export {
  checkAdb,
  checkAllTools,
  checkScrcpy,
  clearCache,
  formatMissingToolsMessage,
  getInstallInstructions,
  resolveExecutable,
} from './ToolChecker';
export type { InstallInstructions, ToolCheckResult, ToolName, ToolStatus } from './ToolChecker';
export { DEFAULT_SETTLE_DELAY_MS, WirelessPromotion } from './WirelessPromotion';
export type {
  PromotionOptions,
  PromotionResult,
  WirelessPromotionConfig,
} from './WirelessPromotion';
export {
  DEFAULT_SETTINGS_PATH,
  MirrorConfigSchema,
  SettingsSchema,
  getDefaultSettings,
  getSettingsPath,
  loadSettings,
  parseSettings,
  saveSettings,
} from './config/Settings';
export type { MirrorConfig, Settings, SettingsInput } from './config/Settings';
export { configureLanguage } from './l10n';
export { ActionType } from './types/Actions';
export type {
  ClearLastWifiSerialAction,
  SessionAction,
  SetLastWifiSerialAction,
  SetPromotionStateAction,
  UpdateDeviceAction,
} from './types/Actions';
export {
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
} from './types/DeviceState';
export type { DeviceRecord } from './types/DeviceState';
export {
  CommandTimeoutError,
  ErrorCode,
  LaunchError,
  QuestCastError,
  describeError,
} from './types/Errors';
export type { ErrorDescription } from './types/Errors';
export { PromotionState } from './types/SessionState';
export type { SessionSnapshot, SessionState } from './types/SessionState';
