/**
 * Structured Logging Utilities
 *
 * Always-on JSON logging, one line per entry, with level, timestamp and
 * structured fields. Debug entries only print in development.
 *
 * Usage:
 *   import { log } from '@/lib/debug';
 *   log.info('Goal created', { goal_id: 'g-1', concepts: 4 });
 *   log.error('Store write failed', { error: err.message });
 *
 *   const logger = createLogger('PhaseEngine');
 *   logger.warn('Surgery fallback', { concept_id: 'N-1700000000' });
 */

const isDev = process.env.NODE_ENV === 'development';

// =============================================================================
// STRUCTURED LOGGING
// =============================================================================

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogType = 'engine' | 'oracle' | 'store' | 'learning' | 'system';

export interface StructuredLogData {
    type?: LogType;
    action?: string;
    error?: string;

    // Learner context
    userId?: string;
    goal_id?: string | null;
    concept_id?: string | null;
    phase?: string;

    // Timing
    duration_ms?: number;

    // Module identifier
    module?: string;

    // Any additional fields
    [key: string]: unknown;
}

/**
 * Output a structured JSON log line
 * Format: {"level":"info","msg":"...","timestamp":"...","field":"value"}
 */
function structuredLog(level: LogLevel, message: string, data?: StructuredLogData): void {
    const logEntry = {
        level,
        msg: message,
        timestamp: new Date().toISOString(),
        ...data,
    };

    const output = JSON.stringify(logEntry);
    switch (level) {
        case 'error':
            console.error(output);
            break;
        case 'warn':
            console.warn(output);
            break;
        case 'debug':
            if (isDev) {
                console.log(output);
            }
            break;
        default:
            console.log(output);
    }
}

export const log = {
    debug: (message: string, data?: StructuredLogData) => structuredLog('debug', message, data),
    info: (message: string, data?: StructuredLogData) => structuredLog('info', message, data),
    warn: (message: string, data?: StructuredLogData) => structuredLog('warn', message, data),
    error: (message: string, data?: StructuredLogData) => structuredLog('error', message, data),
};

export type Logger = typeof log;

/**
 * Create a scoped structured logger for a specific module
 * Adds 'module' field to all log entries
 *
 * @example
 * const logger = createLogger('SqliteStore');
 * logger.info('Opened database', { path: './tutor.db' });
 * // Output: {"level":"info","msg":"Opened database","module":"SqliteStore","path":"./tutor.db",...}
 */
export function createLogger(moduleName: string): Logger {
    return {
        debug: (message: string, data?: StructuredLogData) =>
            structuredLog('debug', message, { module: moduleName, ...data }),
        info: (message: string, data?: StructuredLogData) =>
            structuredLog('info', message, { module: moduleName, ...data }),
        warn: (message: string, data?: StructuredLogData) =>
            structuredLog('warn', message, { module: moduleName, ...data }),
        error: (message: string, data?: StructuredLogData) =>
            structuredLog('error', message, { module: moduleName, ...data }),
    };
}

// =============================================================================
// SPECIALIZED LOGGERS
// =============================================================================

/**
 * Learning-journey logging, one entry per recorded learning event
 *
 * @example
 * learningLog.event('test_evaluated', 'u-1', 'K2', 'Score 85', { score: 85 });
 */
export const learningLog = {
    event: (eventType: string, userId: string | undefined, concept_id: string | null, text: string, extra?: StructuredLogData) =>
        structuredLog('info', text, { type: 'learning', action: eventType, userId, concept_id, ...extra }),

    subscriberFailed: (eventType: string, error: string) =>
        structuredLog('error', 'Learning event subscriber failed', { type: 'learning', action: 'subscriber_error', event_type: eventType, error }),
};

/**
 * Engine step logging
 */
export const engineLog = {
    phaseStarted: (phase: string, step: number, userId: string) =>
        structuredLog('debug', 'Phase started', { type: 'engine', action: 'phase_start', phase, step, userId }),

    phaseFailed: (phase: string, userId: string, error: string) =>
        structuredLog('error', 'Phase failed', { type: 'engine', action: 'phase_failed', phase, userId, error }),

    runFinished: (status: string, steps: number, duration_ms: number, userId: string) =>
        structuredLog('info', 'Run finished', { type: 'engine', action: 'run_finished', status, steps, duration_ms, userId }),
};
