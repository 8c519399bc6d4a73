export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type Threshold = LogLevel | 'silent';

type LogMetadata = Record<string, unknown>;

const LEVEL_ORDER: Record<Threshold, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

const isThreshold = (value: string): value is Threshold =>
    value === 'debug' || value === 'info' || value === 'warn' || value === 'error' || value === 'silent';

const isProduction = (): boolean => process.env.NODE_ENV === 'production';

/**
 * LOG_LEVEL wins; otherwise production logs warn and above, everything
 * else logs from debug.
 */
export const resolveLogThreshold = (): Threshold => {
    const configured = process.env.LOG_LEVEL?.trim().toLowerCase();
    if (configured && isThreshold(configured)) return configured;
    return isProduction() ? 'warn' : 'debug';
};

// Transcript content never reaches a log line.
const REDACT_KEYS = [/text$/i, /transcript/i, /statement/i, /dialogue/i, /content/i, /entity/i];

const redactValue = (value: unknown): unknown => {
    if (typeof value === 'string') {
        // Keep short labels and ids, drop anything that looks like a payload.
        if (value.length > 120 || value.includes('\n')) {
            return '[REDACTED]';
        }
        return value;
    }

    if (Array.isArray(value)) {
        return value.map((v) => redactValue(v));
    }

    if (value !== null && typeof value === 'object') {
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(value)) {
            if (REDACT_KEYS.some((re) => re.test(k))) {
                out[k] = '[REDACTED]';
            } else {
                out[k] = redactValue(v);
            }
        }
        return out;
    }

    return value;
};

const shouldLog = (level: LogLevel): boolean =>
    LEVEL_ORDER[level] >= LEVEL_ORDER[resolveLogThreshold()];

export const emitLogEntry = (level: LogLevel, message: string, metadata?: LogMetadata): void => {
    if (!shouldLog(level)) return;

    const entry = {
        timestamp: new Date().toISOString(),
        level,
        message: redactValue(message),
        ...(metadata ? { metadata: redactValue(metadata) } : {}),
    };

    if (level === 'error') {
        console.error(JSON.stringify(entry));
    } else if (level === 'warn') {
        console.warn(JSON.stringify(entry));
    } else if (level === 'info') {
        console.info(JSON.stringify(entry));
    } else {
        console.log(JSON.stringify(entry));
    }
};

export const appLogger = {
    debug(message: string, metadata?: LogMetadata) {
        emitLogEntry('debug', message, metadata);
    },
    info(message: string, metadata?: LogMetadata) {
        emitLogEntry('info', message, metadata);
    },
    warn(message: string, metadata?: LogMetadata) {
        emitLogEntry('warn', message, metadata);
    },
    error(message: string, metadata?: LogMetadata) {
        emitLogEntry('error', message, metadata);
    },
};
