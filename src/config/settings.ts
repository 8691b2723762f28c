/**
 * @file Runtime Settings Service
 *
 * Process-wide settings with central validation and deterministic
 * precedence (programmatic override > env > defaults).
 *
 * @module
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type SettingSource = 'override' | 'env' | 'default';

export type SetResult =
    | { ok: true; value: LogLevel }
    | { ok: false; error: string };

/** Severity order; a message is emitted when its rank reaches the threshold. */
export const LOG_LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 50,
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LOG_LEVEL_ENV = 'OPARGS_LOG_LEVEL';

export class SettingsService {
    private static singleton: SettingsService | null = null;
    private logLevelOverride: LogLevel | null = null;
    private readonly defaultLogLevel: LogLevel = 'warn';

    /**
     * Resolve process-global singleton.
     */
    public static instance_get(): SettingsService {
        if (!SettingsService.singleton) {
            SettingsService.singleton = new SettingsService();
        }
        return SettingsService.singleton;
    }

    /**
     * Override the log threshold with validation.
     */
    public logLevel_set(value: unknown): SetResult {
        const level: LogLevel | null = logLevel_parse(value);
        if (!level) {
            return { ok: false, error: `Invalid value for log level: ${String(value)}` };
        }
        this.logLevelOverride = level;
        return { ok: true, value: level };
    }

    /**
     * Drop the programmatic override.
     */
    public logLevel_unset(): void {
        this.logLevelOverride = null;
    }

    /**
     * Resolve the effective log threshold.
     */
    public logLevel_resolve(): LogLevel {
        if (this.logLevelOverride) return this.logLevelOverride;
        return this.envLogLevel_resolve() ?? this.defaultLogLevel;
    }

    /**
     * Resolve source of the effective log threshold.
     */
    public logLevel_source(): SettingSource {
        if (this.logLevelOverride) return 'override';
        if (this.envLogLevel_resolve()) return 'env';
        return 'default';
    }

    private envLogLevel_resolve(): LogLevel | null {
        const envRaw: string | undefined = process.env[LOG_LEVEL_ENV];
        if (!envRaw) return null;
        return logLevel_parse(envRaw);
    }
}

/**
 * Normalize a user-supplied level name; null when it names no level.
 */
export function logLevel_parse(value: unknown): LogLevel | null {
    if (typeof value !== 'string') return null;
    const normalized: string = value.trim().toLowerCase();
    return LOG_LEVELS.find((level: LogLevel): boolean => level === normalized) ?? null;
}
