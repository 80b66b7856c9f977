/**
 * Configuration exports for bili-follow-sync
 */

export {
  readConfigDocument,
  isTable,
  configError,
  type ConfigDocument,
  type ConfigError,
  type ConfigErrorReason,
  type ConfigResult,
} from './config-file.js';

export {
  extractCredential,
  formatConfigError,
  loadCredential,
} from './credential-config.js';

export {
  extractFollowSettings,
  DEFAULT_FOLLOW_SETTINGS,
  FOLLOW_SETTINGS_SECTION,
  type FollowSettings,
} from './follow-settings.js';

export {
  getAppConfig,
  DEFAULT_CONFIG_FILE,
  DEFAULT_FOLLOWINGS_FILE,
  type AppConfig,
} from './app-config.js';
