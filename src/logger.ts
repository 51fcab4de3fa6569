/** Sink for diagnostic output. Defaults to the console. */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const PREFIX = '[lut]';

export const consoleLogger: Logger = {
  info: message => console.log(`${PREFIX} ${message}`),
  warn: message => console.warn(`${PREFIX} ${message}`),
  error: message => console.error(`${PREFIX} ${message}`),
};
