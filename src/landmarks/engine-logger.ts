// Engine logging - a logger is created per call, nothing is buffered at module level

export type LogVerbosity = 'normal' | 'verbose';

export type LogSink = (message: string) => void;

export interface EngineLogger {
  log(message: string): void;
  logDebug(message: string): void;
}

// Check if we're running in test environment
const isTest = typeof process !== 'undefined' && process.env.NODE_ENV === 'test';

// Allow enabling console logs during tests via environment variable
const FORCE_CONSOLE_LOGS = typeof process !== 'undefined' && process.env.LANDMARK_VERBOSE_TESTS === 'true';

const DEFAULT_VERBOSITY: LogVerbosity =
  typeof process !== 'undefined' && process.env.LANDMARK_LOG_LEVEL === 'verbose' ? 'verbose' : 'normal';

/**
 * Create a logger for one engine call.
 * - log(): always emitted, to the console (except under test) and to onLog
 * - logDebug(): emitted only when verbosity is 'verbose'
 */
export function createEngineLogger(
  options: { onLog?: LogSink; verbosity?: LogVerbosity } = {}
): EngineLogger {
  const verbosity = options.verbosity ?? DEFAULT_VERBOSITY;
  const shouldLogToConsole = !isTest || FORCE_CONSOLE_LOGS;

  const log = (message: string): void => {
    if (shouldLogToConsole) {
      console.log(message);
    }
    options.onLog?.(message);
  };

  return {
    log,
    logDebug(message: string) {
      if (verbosity !== 'verbose') {
        return;
      }
      log(message);
    },
  };
}
