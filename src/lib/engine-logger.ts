/**
 * Logger seam for the engine. Scoring stays pure; the few events worth
 * auditing (boosts applied, pathway fallbacks, collaborator failures) go
 * through an injected EngineLogger instead of a module-level console.
 */

export type LogContext = Readonly<Record<string, unknown>>;

export interface EngineLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const PREFIX = "[biomarker-gates]";

export const consoleLogger: EngineLogger = {
  debug: (message, context) => console.debug(PREFIX, message, context ?? {}),
  info: (message, context) => console.info(PREFIX, message, context ?? {}),
  warn: (message, context) => console.warn(PREFIX, message, context ?? {}),
  error: (message, context) => console.error(PREFIX, message, context ?? {}),
};

export const silentLogger: EngineLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/** Normalize an unknown thrown value into a loggable message. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
