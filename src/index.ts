/**
 * @file Package entry point
 *
 * @module
 */

export * from './opargs/index.js';
export { SettingsService, logLevel_parse } from './config/settings.js';
export type { LogLevel, SettingSource, SetResult } from './config/settings.js';
export { log_debug, log_info, log_warn, log_error } from './telemetry/log.js';
export type { LogContext } from './telemetry/log.js';
