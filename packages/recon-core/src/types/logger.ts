/**
 * Minimal logging contract the engine writes diagnostics to
 */

export interface EngineLogger {
  debug(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
}

export const consoleLogger: EngineLogger = {
  debug: () => undefined,
  warn: (message, fields) => {
    if (fields) {
      console.warn(`[driftcheck] ${message}`, fields);
    } else {
      console.warn(`[driftcheck] ${message}`);
    }
  },
};
