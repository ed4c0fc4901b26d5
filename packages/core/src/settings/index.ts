/**
 * @fileoverview Settings exports
 */

export type {
  TrellisSettings,
  UserSettings,
  LoggingSettings,
  UsageSettings,
  SuggestionSettings,
} from './types.js';
export { DEFAULT_SETTINGS } from './defaults.js';
export {
  UserSettingsSchema,
  mergeSettings,
  getSettingsPath,
  loadUserSettings,
  loadSettings,
  applyEnvOverrides,
  getSettings,
  reloadSettings,
  setSettingsPath,
  clearSettingsCache,
} from './loader.js';
