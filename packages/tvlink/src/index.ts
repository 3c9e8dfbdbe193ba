export {
  FileConfigProvider,
  FALLBACK_DEVICE_NAMES,
  getConfigPath,
  selectDevice,
  type FileConfigProviderOptions,
} from './config-loader.js';
export { DesktopNotifier, buildNotifySendArgs } from './notifications/desktop-notifier.js';
export { runDeviceOperation, type CommandContext } from './commands/context.js';
export { getSetting, setSettings } from './commands/settings.js';
export { sendRequest, parseRequestPayload } from './commands/request.js';
export { coerceSettingValue, parseSettingAssignments } from './utils/parse-setting.js';
export {
  createProgram,
  createDefaultContext,
  type GlobalOptions,
  type ProgramIO,
} from './program.js';
