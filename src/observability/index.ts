/**
 * Observability Module
 *
 * Logger and Metrics hooks shared by every pipeline stage. Each module accepts
 * injected implementations and falls back to the console logger and no-op
 * metrics defined here.
 *
 * Usage:
 * ```typescript
 * const logger = createConsoleLogger('merger');
 * logger.info('Profile merged', { sources: 4 });
 * // [INFO] [merger] Profile merged {"sources":4}
 * ```
 */

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Logger interface for observability
 */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Metrics interface for observability
 */
export interface Metrics {
  increment(metric: string, tags?: Record<string, string>): void;
  gauge(metric: string, value: number, tags?: Record<string, string>): void;
  timing(metric: string, value: number, tags?: Record<string, string>): void;
}

// ============================================================================
// Default Implementations
// ============================================================================

/**
 * Create a console logger that tags every line with the module name
 */
export function createConsoleLogger(module: string): Logger {
  const format = (meta?: Record<string, unknown>): string => (meta ? JSON.stringify(meta) : '');
  return {
    info: (msg, meta) => console.log(`[INFO] [${module}] ${msg}`, format(meta)),
    warn: (msg, meta) => console.warn(`[WARN] [${module}] ${msg}`, format(meta)),
    error: (msg, meta) => console.error(`[ERROR] [${module}] ${msg}`, format(meta)),
    debug: (msg, meta) => console.debug(`[DEBUG] [${module}] ${msg}`, format(meta)),
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

export const noopMetrics: Metrics = {
  increment: () => {},
  gauge: () => {},
  timing: () => {},
};
