import debug from 'debug';

type LoggerFn = (message: string) => void;

let logger: LoggerFn | undefined;
const debugLogger = debug('acme-wire');

export const debugDecode = debugLogger.extend('decode');
export const debugEncode = debugLogger.extend('encode');
export const debugRegistry = debugLogger.extend('registry');

export function setLogger(fn: LoggerFn | undefined): void {
  logger = fn;
}

export function logWarn(message: string, ...args: unknown[]): void {
  const warnMessage = `WARN: ${message}`;

  if (logger) {
    logger(warnMessage);
  }

  debugLogger(warnMessage, ...args);
}
