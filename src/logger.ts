import chalk from 'chalk';
import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogSink {
  write(level: LogLevel, message: string): void;
  close?(): Promise<void>;
}

/**
 * Callable logger handed to every component. `logger(message)` logs at info level;
 * debug lines only reach the sinks when `verbose` is set.
 */
export type SearchLogger = ((message: string) => void) & {
  verbose: boolean;
  debug: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  close: () => Promise<void>;
};

export interface CreateLoggerOptions {
  sinks: LogSink[];
  verbose?: boolean;
}

export function createLogger({ sinks, verbose = false }: CreateLoggerOptions): SearchLogger {
  const emit = (level: LogLevel, message: string) => {
    if (level === 'debug' && !logger.verbose) {
      return;
    }
    for (const sink of sinks) {
      sink.write(level, message);
    }
  };
  const logger: SearchLogger = Object.assign((message: string) => emit('info', message), {
    verbose,
    debug: (message: string) => emit('debug', message),
    warn: (message: string) => emit('warn', message),
    error: (message: string) => emit('error', message),
    close: async () => {
      await Promise.all(sinks.map((sink) => sink.close?.()));
    },
  });
  return logger;
}

const LEVEL_STYLES: Record<LogLevel, (text: string) => string> = {
  debug: (text) => chalk.dim(text),
  info: (text) => text,
  warn: (text) => chalk.yellow(text),
  error: (text) => chalk.red(text),
};

export function createConsoleSink(write: (line: string) => void = (line) => console.log(line)): LogSink {
  return {
    write(level, message) {
      write(LEVEL_STYLES[level](level === 'debug' ? `[debug] ${message}` : message));
    },
  };
}

export function formatLogLine(level: LogLevel, message: string, now: Date = new Date()): string {
  // Strip ANSI colour codes from chalk-styled messages.
  const plain = message.replace(/\u001b\[[0-9;]*m/g, '');
  return `${now.toISOString()} - ${level.toUpperCase()} - ${plain}`;
}

export function createFileSink(filePath: string): LogSink {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const stream = fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf8' });
  return {
    write(level, message) {
      stream.write(`${formatLogLine(level, message)}\n`);
    },
    close: () =>
      new Promise<void>((resolve, reject) => {
        stream.once('error', reject);
        stream.end(() => resolve());
      }),
  };
}
