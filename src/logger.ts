/**
 * Small centralized logger. Debug output only appears in verbose mode and
 * never goes to stdout. While the TUI owns the terminal, a sink takes over
 * so nothing is written over the screen.
 */

export type LoggerOptions = {
  verbose?: boolean; // emit debug messages
  sink?: (line: string) => void;
};

export class Logger {
  private verbose: boolean;
  private sink: ((line: string) => void) | null;

  constructor(opts: LoggerOptions = {}) {
    this.verbose = !!opts.verbose;
    this.sink = opts.sink ?? null;
  }

  /** Route all output to `sink` until {@link release} is called. */
  capture(sink: (line: string) => void): void {
    this.sink = sink;
  }

  release(): void {
    this.sink = null;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  debug(message: string): void {
    if (!this.verbose) return;
    this.write('debug', message, console.error);
  }

  info(message: string): void {
    this.write('info', message, console.log);
  }

  error(message: string): void {
    this.write('error', message, console.error);
  }

  private write(level: string, message: string, fallback: (line: string) => void): void {
    if (this.sink) {
      this.sink(`${level}: ${message}`);
      return;
    }
    fallback(message);
  }
}

export default Logger;
