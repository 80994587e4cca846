/**
 * The console methods that the checker and shrinker write to.
 *
 * See {@link https://developer.mozilla.org/en-US/docs/Web/API/console} MDN for
 * more about the console object.
 */
export interface SystemConsole {
  /**
   * Writes a message to the console at "log" log level.
   */
  log(...data: unknown[]): void;

  /**
   * Writes a message to the console at "error" log level.
   */
  error(...data: unknown[]): void;
}

export const systemConsole: SystemConsole = console;

/** A console that discards everything written to it. */
export const nullConsole: SystemConsole = {
  log() {},
  error() {},
};

/**
 * A console that keeps its output, for tests that check what was logged.
 */
export class RecordingConsole implements SystemConsole {
  readonly logged: string[] = [];
  readonly errors: string[] = [];

  log(...data: unknown[]): void {
    this.logged.push(data.map(String).join(" "));
  }

  error(...data: unknown[]): void {
    this.errors.push(data.map(String).join(" "));
  }
}
