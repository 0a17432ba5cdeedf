// src/logger.ts

import { MODBUS_EXCEPTION_MESSAGES, functionCodeName } from './constants/constants.js';
import type { LogContext, LogEntry, LoggerInstance, LogLevel } from './types/modbus-types.js';

type ConsoleMethod = 'debug' | 'info' | 'warn' | 'error';

const CONSOLE_METHODS: Record<LogLevel, ConsoleMethod> = {
  trace: 'debug',
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  error: 'error',
};

export class Logger {
  private static readonly LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'error';
  private enabled: boolean = true;
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'exception' | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    exception: '\x1b[1;41m',
    reset: '\x1b[0m',
  };

  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private watchCallback: ((entry: LogEntry) => void) | null = null;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  /**
   * Собирает заголовок строки лога из контекста
   */
  private format(level: LogLevel, message: string, context: LogContext): string {
    const color = this.useColors ? this.COLORS[level] : '';
    const reset = this.useColors ? this.COLORS.reset : '';

    const parts: string[] = [`[${this.getTimestamp()}]`, `[${level.toUpperCase()}]`];
    if (context.logger) parts.push(`[${context.logger}]`);
    if (context.transport) parts.push(`[${context.transport}]`);
    if (context.unitId != null) parts.push(`[U:${context.unitId}]`);
    if (context.funcCode != null) {
      const hex = `0x${context.funcCode.toString(16).padStart(2, '0')}`;
      parts.push(`[F:${hex}/${functionCodeName(context.funcCode)}]`);
    }
    if (context.transactionId != null) parts.push(`[TID:${context.transactionId}]`);
    if (context.exceptionCode != null) {
      const name = MODBUS_EXCEPTION_MESSAGES[context.exceptionCode] ?? 'Unknown';
      const highlight = this.useColors ? this.COLORS.exception : '';
      parts.push(`${highlight}[EXC:${context.exceptionCode}/${name}]${reset}${color}`);
    }
    if (context.address != null) parts.push(`[A:${context.address}]`);
    if (context.quantity != null) parts.push(`[Q:${context.quantity}]`);
    if (context.responseTime != null) parts.push(`[RT:${context.responseTime}ms]`);

    return `${color}${parts.join('')}${reset} ${message}`;
  }

  private shouldLog(level: LogLevel, context: LogContext): boolean {
    if (!this.enabled) return false;
    const category = context.logger ? this.categoryLevels[context.logger] : undefined;
    if (category === 'none') return false;
    const threshold = category ?? this.currentLevel;
    return Logger.LEVELS.indexOf(level) >= Logger.LEVELS.indexOf(threshold);
  }

  private output(level: LogLevel, message: string, context: LogContext = {}): void {
    const merged: LogContext = { ...this.globalContext, ...context };
    if (!this.shouldLog(level, merged)) return;

    this.logCounts[level]++;
    this.watchCallback?.({ level, message, context: merged });
    console[CONSOLE_METHODS[level]](this.format(level, message, merged));
  }

  trace(message: string, context?: LogContext): void {
    this.output('trace', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.output('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.output('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.output('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.output('error', message, context);
  }

  setLevel(level: LogLevel): void {
    if (!Logger.LEVELS.includes(level)) throw new Error(`Unknown log level: ${level}`);
    this.currentLevel = level;
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !Logger.LEVELS.includes(level))
      throw new Error(`Unknown log level: ${level}`);
    this.categoryLevels[category] = level;
  }

  pauseCategory(category: string): void {
    this.categoryLevels[category] = 'none';
  }

  resumeCategory(category: string): void {
    delete this.categoryLevels[category];
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  disableColors(): void {
    this.useColors = false;
  }

  addGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...this.globalContext, ...ctx };
  }

  /**
   * Подписка на все выводимые записи (после фильтрации по уровню)
   */
  watch(callback: (entry: LogEntry) => void): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  getCounts(): Readonly<Record<LogLevel, number>> {
    return { ...this.logCounts };
  }

  /**
   * Создаёт логгер для категории. Уровень категории переопределяет глобальный.
   */
  createLogger(name: string): LoggerInstance {
    const withName = (context?: LogContext): LogContext => ({ ...context, logger: name });
    return {
      trace: (message, context) => this.output('trace', message, withName(context)),
      debug: (message, context) => this.output('debug', message, withName(context)),
      info: (message, context) => this.output('info', message, withName(context)),
      warn: (message, context) => this.output('warn', message, withName(context)),
      error: (message, context) => this.output('error', message, withName(context)),
      setLevel: level => this.setLevelFor(name, level),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

/** Shared instance used by every module of the library */
export const logger = new Logger();

export default Logger;
