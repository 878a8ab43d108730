import { isLogLevel, LOG_LEVELS, LogLevel } from '../../config/onboardingConfig';

export interface LogMeta {
  [key: string]: unknown;
  requestId?: string;
  userName?: string;
}

export class Logger {
  private serviceName: string;
  private defaultContext?: LogMeta;
  private minLevel?: LogLevel;

  /**
   * @param minLevel - threshold; when omitted, LOG_LEVEL is read at each call (default info)
   */
  constructor(serviceName: string, context?: LogMeta, minLevel?: LogLevel) {
    this.serviceName = serviceName;
    this.defaultContext = context;
    this.minLevel = minLevel;
  }

  private threshold(): LogLevel {
    if (this.minLevel) return this.minLevel;
    const fromEnv = (process.env.LOG_LEVEL || 'info').toLowerCase();
    return isLogLevel(fromEnv) ? fromEnv : 'info';
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.threshold());
  }

  private formatMessage(level: LogLevel, message: string, meta?: LogMeta): string {
    const timestamp = new Date().toISOString();
    const enrichedMeta = {
      ...this.defaultContext,
      ...meta,
    };
    const metaStr = Object.keys(enrichedMeta).length > 0 ? ` ${JSON.stringify(enrichedMeta)}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] [${this.serviceName}] ${message}${metaStr}`;
  }

  info(message: string, meta?: LogMeta): void {
    if (this.enabled('info')) console.log(this.formatMessage('info', message, meta));
  }

  error(message: string, meta?: LogMeta): void {
    if (this.enabled('error')) console.error(this.formatMessage('error', message, meta));
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.enabled('warn')) console.warn(this.formatMessage('warn', message, meta));
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.enabled('debug')) console.log(this.formatMessage('debug', message, meta));
  }

  setContext(context: LogMeta): void {
    this.defaultContext = context;
  }
}
