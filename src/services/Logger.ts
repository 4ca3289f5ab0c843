import fs from 'fs';
import path from 'path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

interface LogSink {
  minLevel: LogLevel;
  logFile: string | null;
}

// Process-wide sink; configured once by the entry point.
const sink: LogSink = {
  minLevel: 'INFO',
  logFile: null,
};

export function configureLogging(opts: { level?: LogLevel; logFile?: string | null }): void {
  if (opts.level) sink.minLevel = opts.level;
  if (opts.logFile !== undefined) {
    sink.logFile = opts.logFile;
    if (sink.logFile) {
      const dir = path.dirname(sink.logFile);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }
  }
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'INFO'): LogLevel {
  const upper = (value || '').toUpperCase();
  if (upper === 'DEBUG' || upper === 'INFO' || upper === 'WARN' || upper === 'ERROR') {
    return upper;
  }
  return fallback;
}

export class Logger {
  private component: string;

  constructor(component: string) {
    this.component = component;
  }

  debug(message: string): void {
    this.write('DEBUG', message);
  }

  info(message: string): void {
    this.write('INFO', message);
  }

  warn(message: string): void {
    this.write('WARN', message);
  }

  error(message: string, err?: unknown): void {
    const detail = err instanceof Error ? `: ${err.message}` : err !== undefined ? `: ${String(err)}` : '';
    this.write('ERROR', `${message}${detail}`);
  }

  private write(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[sink.minLevel]) return;

    const logLine = `${new Date().toISOString()} [${level}] [${this.component}] ${message}`;
    if (level === 'ERROR') {
      console.error(logLine);
    } else if (level === 'WARN') {
      console.warn(logLine);
    } else {
      console.log(logLine);
    }

    if (sink.logFile) {
      try {
        fs.appendFileSync(sink.logFile, logLine + '\n');
      } catch (err) {
        sink.logFile = null;
        console.error(`[Logger] Log file disabled after write failure: ${String(err)}`);
      }
    }
  }
}
