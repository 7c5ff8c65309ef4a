/**
 * Configuration module exports
 */

export {
  loadSettings,
  apiUrlFor,
  DEFAULT_API_URL,
  DEFAULT_USER_AGENT,
  DEFAULT_DB_FILE,
  type Settings,
  type TranslateSettings,
  type HttpSettings,
} from './settings.js';
