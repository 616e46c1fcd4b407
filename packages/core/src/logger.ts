/** Logger interface injected into servers, clients and registries. */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/** Discards everything. Default for library components. */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function createConsoleLogger(scope?: string): Logger {
  const tag = scope ? ` [${scope}]` : '';
  return {
    debug: (msg: string, ...args: unknown[]) => console.debug(`[DEBUG]${tag} ${msg}`, ...args),
    info: (msg: string, ...args: unknown[]) => console.log(`[INFO]${tag} ${msg}`, ...args),
    warn: (msg: string, ...args: unknown[]) => console.warn(`[WARN]${tag} ${msg}`, ...args),
    error: (msg: string, ...args: unknown[]) => console.error(`[ERROR]${tag} ${msg}`, ...args),
  };
}
