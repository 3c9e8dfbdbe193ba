export {
  buildRequest,
  getSystemSetting,
  setSystemSetting,
  GET_SYSTEM_SETTINGS_URI,
  SET_SYSTEM_SETTINGS_URI,
  type SettingValue,
} from './system-settings.js';
