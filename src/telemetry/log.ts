/**
 * @file Console Logging
 *
 * Level-filtered logging on stderr. stdout is left to whatever embeds the
 * library. The threshold comes from `SettingsService` and is read on each
 * call, so an override takes effect immediately.
 *
 * @module telemetry
 */

import { LOG_LEVEL_RANK, SettingsService, type LogLevel } from '../config/settings.js';

export type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

type EmitLevel = Exclude<LogLevel, 'silent'>;

const PREFIX = '[opargs]';

function emit(level: EmitLevel, message: string, context?: LogContext): void {
    const threshold: LogLevel = SettingsService.instance_get().logLevel_resolve();
    if (LOG_LEVEL_RANK[level] < LOG_LEVEL_RANK[threshold]) return;

    const sink = level === 'warn' ? console.warn : console.error;
    const line = `${PREFIX} ${level.toUpperCase()} ${message}`;
    if (context && Object.keys(context).length > 0) {
        sink(line, context);
        return;
    }
    sink(line);
}

export const log_debug: LoggerFn = (message, context) => emit('debug', message, context);
export const log_info: LoggerFn = (message, context) => emit('info', message, context);
export const log_warn: LoggerFn = (message, context) => emit('warn', message, context);
export const log_error: LoggerFn = (message, context) => emit('error', message, context);
