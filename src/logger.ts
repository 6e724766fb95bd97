export interface LoggerBackend {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

const PREFIX = "[memvault]";

let sink: LoggerBackend = console;
let debugEnabled = false;

/**
 * Route all engine logging through the host logger.
 * Called once early (debug off) and again after config parsing.
 */
export function initLogger(next: LoggerBackend, debug: boolean): void {
  sink = next;
  debugEnabled = debug;
}

export const log = {
  debug(message: string, ...rest: unknown[]): void {
    if (!debugEnabled) return;
    sink.debug(`${PREFIX} ${message}`, ...rest);
  },
  info(message: string, ...rest: unknown[]): void {
    sink.info(`${PREFIX} ${message}`, ...rest);
  },
  warn(message: string, ...rest: unknown[]): void {
    sink.warn(`${PREFIX} ${message}`, ...rest);
  },
  error(message: string, err?: unknown): void {
    if (err === undefined) {
      sink.error(`${PREFIX} ${message}`);
      return;
    }
    const detail = err instanceof Error ? err.message : String(err);
    sink.error(`${PREFIX} ${message}: ${detail}`);
  },
};
