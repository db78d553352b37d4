export interface Logger {
  debug: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
}

const defaultLogger: Logger = {
  debug: () => {},
  info: (message, ...args) => console.log(message, ...args),
  warn: (message, ...args) => console.warn(message, ...args),
};

let currentLogger: Logger = defaultLogger;

export function setLogger(logger: Logger): void {
  currentLogger = logger;
}

export function resetLogger(): void {
  currentLogger = defaultLogger;
}

export function getLogger(): Logger {
  return currentLogger;
}

export function debug(message: string, ...args: unknown[]): void {
  currentLogger.debug(message, ...args);
}

export function warn(message: string, ...args: unknown[]): void {
  currentLogger.warn(message, ...args);
}
