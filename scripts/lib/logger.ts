export type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'debug';

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

const PREFIX: Record<LogLevel, string> = {
  info: '   ',
  success: ' ✅',
  warn: ' ⚠️',
  error: ' ❌',
  debug: ' 🐛',
};

/**
 * Timestamped console logger used by the CLI entry points.
 * Debug lines are dropped unless debug mode is on.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly debugMode: boolean = false,
    private readonly write: (line: string) => void = console.log
  ) {}

  private log(level: LogLevel, message: string): void {
    this.write(`[${new Date().toISOString()}]${PREFIX[level]} ${message}`);
  }

  info(message: string): void {
    this.log('info', message);
  }

  success(message: string): void {
    this.log('success', message);
  }

  warn(message: string): void {
    this.log('warn', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  debug(message: string): void {
    if (this.debugMode) {
      this.log('debug', message);
    }
  }
}

/**
 * Keeps every line in memory; used where output has to be inspected afterwards.
 */
export class MemoryLogger implements Logger {
  readonly lines: Array<{ level: LogLevel; message: string }> = [];

  info(message: string): void {
    this.lines.push({ level: 'info', message });
  }

  success(message: string): void {
    this.lines.push({ level: 'success', message });
  }

  warn(message: string): void {
    this.lines.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.lines.push({ level: 'error', message });
  }

  debug(message: string): void {
    this.lines.push({ level: 'debug', message });
  }

  messages(level?: LogLevel): string[] {
    return this.lines
      .filter(line => level === undefined || line.level === level)
      .map(line => line.message);
  }
}
