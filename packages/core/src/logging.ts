export interface ILogger {
  debug(message: string): void;
  error(message: string): void;
}

export const nullLogger: ILogger = {
  debug() { },
  error() { },
};
