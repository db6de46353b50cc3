export interface Logger {
  log(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const NOOP_LOGGER: Logger = {
  log() {},
  info() {},
  warn() {},
  error() {},
};
