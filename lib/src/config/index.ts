/**
 * Configuration Module
 */

export {
  SettingsSchema,
  type Settings,
  type DataPaths,
  loadSettings,
  resolveDataPaths,
  toLogFormat,
} from './settings.js';
