import fs from 'fs';
import path from 'path';
import { Logger, LogLevel } from '../../core/services/Logger';

export type RotationMode = 'none' | 'size';

export interface FileLogOptions {
  rotate?: RotationMode;
  maxSizeBytes?: number;
  maxFiles?: number;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const CONSOLE_METHOD: Record<LogLevel, (message?: unknown, ...args: unknown[]) => void> = {
  debug: (...a) => console.debug(...a),
  info: (...a) => console.info(...a),
  warn: (...a) => console.warn(...a),
  error: (...a) => console.error(...a),
};

export class ConsoleLogger implements Logger {
  private timers: Map<string, number> = new Map();
  private stream?: fs.WriteStream;
  private rotation: RotationMode;
  private maxSizeBytes: number;
  private maxFiles: number;
  private currentSize = 0;
  private retired: Promise<void>[] = [];

  constructor(
    private logLevel: LogLevel = 'info',
    private filePath?: string,
    options: FileLogOptions = {}
  ) {
    this.rotation = options.rotate ?? 'none';
    this.maxSizeBytes = options.maxSizeBytes ?? 10 * 1024 * 1024;
    this.maxFiles = options.maxFiles ?? 5;
    if (filePath) this.openStream(filePath);
  }

  // Opened synchronously so a rotation right after start renames a file that exists.
  private openStream(filePath: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const fd = fs.openSync(filePath, 'a');
    this.stream = fs.createWriteStream(filePath, { fd, encoding: 'utf8' });
    this.currentSize = fs.fstatSync(fd).size;
  }

  private endStream(stream: fs.WriteStream): Promise<void> {
    return new Promise((resolve) => stream.end(resolve));
  }

  // Flushes the current file and any rotated-out streams still writing.
  async close(): Promise<void> {
    const pending = this.retired;
    this.retired = [];
    if (this.stream) pending.push(this.endStream(this.stream));
    this.stream = undefined;
    await Promise.all(pending);
  }

  // app.log -> app.log.1 -> app.log.2 ... keeping at most maxFiles rotated files.
  private rotate(filePath: string): void {
    if (this.stream) this.retired.push(this.endStream(this.stream));
    this.stream = undefined;
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const src = `${filePath}.${i}`;
      if (fs.existsSync(src)) fs.renameSync(src, `${filePath}.${i + 1}`);
    }
    if (fs.existsSync(filePath)) fs.renameSync(filePath, `${filePath}.1`);
    this.openStream(filePath);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.logLevel];
  }

  private formatMessage(level: LogLevel, message: string): string {
    return `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}`;
  }

  private stringify(arg: unknown): string {
    if (arg instanceof Error) {
      return `${arg.name}: ${arg.message}${arg.stack ? `\n${arg.stack}` : ''}`;
    }
    if (typeof arg === 'string') return arg;
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }

  private writeToFile(line: string, args: unknown[]): void {
    if (!this.stream || !this.filePath) return;
    const extras = args.length ? ' ' + args.map((a) => this.stringify(a)).join(' ') : '';
    const text = `${line}${extras}\n`;
    const bytes = Buffer.byteLength(text, 'utf8');
    if (this.rotation === 'size' && this.currentSize > 0 && this.currentSize + bytes > this.maxSizeBytes) {
      this.rotate(this.filePath);
    }
    this.stream?.write(text);
    this.currentSize += bytes;
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.shouldLog(level)) return;
    const line = this.formatMessage(level, message);
    CONSOLE_METHOD[level](line, ...args);
    this.writeToFile(line, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, args);
  }

  time(label: string): void {
    this.timers.set(label, Date.now());
    this.debug(`Timer '${label}' started`);
  }

  timeEnd(label: string): number {
    const startTime = this.timers.get(label);
    if (startTime === undefined) {
      this.warn(`Timer '${label}' does not exist`);
      return 0;
    }
    const duration = Date.now() - startTime;
    this.timers.delete(label);
    this.info(`Timer '${label}': ${duration}ms`);
    return duration;
  }

  timeLog(label: string, message?: string, ...args: unknown[]): void {
    const startTime = this.timers.get(label);
    if (startTime === undefined) {
      this.warn(`Timer '${label}' does not exist`);
      return;
    }
    const duration = Date.now() - startTime;
    this.info(message ? `${message} (${duration}ms)` : `Timer '${label}': ${duration}ms`, ...args);
  }
}
