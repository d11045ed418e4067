import { Logger } from './types';

/**
 * Logger writing to the console. Errors and warnings go to stderr.
 */
export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * In-memory logger, mostly for tests and for embedding the injector
 */
export class MemoryLogger implements Logger {
  readonly lines: Array<{ level: keyof Logger; message: string }> = [];

  info(message: string): void {
    this.lines.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.lines.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.lines.push({ level: 'error', message });
  }

  messages(level?: keyof Logger): string[] {
    return this.lines
      .filter((line) => !level || line.level === level)
      .map((line) => line.message);
  }
}

export function timestamp(): string {
  return new Date().toISOString();
}
