export { SettingsRepository } from './settings.repository';
