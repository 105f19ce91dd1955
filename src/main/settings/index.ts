/**
 * Settings Module
 *
 * Exports the SettingsManager for validated settings and API key lookup.
 */

export {
  SettingsManager,
  SettingsError,
  SettingsSchema,
  DEFAULT_SETTINGS_PATH,
  normalizeSecret,
  resolveSettingsPath,
} from './SettingsManager';

export type { AppSettings, CredentialStore, SettingsInput } from './SettingsManager';
