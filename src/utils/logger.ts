import type { LogLevel, LogEntry } from '../types/common.js';

export type LogEmitter = (entry: LogEntry) => void;

/**
 * Structured logger for the exporter.
 * Writes one line per entry to stderr unless an emitter is installed, so
 * stdout stays free for the record preview.
 */
export class Logger {
  private minLevel: LogLevel = 'info';
  private emitter: LogEmitter | null = null;
  private appName: string;

  private static readonly LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    notice: 2,
    warning: 3,
    error: 4,
    critical: 5,
    alert: 6,
    emergency: 7,
  };

  constructor(appName: string) {
    this.appName = appName;
  }

  /**
   * Route entries to a custom emitter instead of stderr
   */
  setEmitter(emitter: LogEmitter): void {
    this.emitter = emitter;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  isEnabled(level: LogLevel): boolean {
    return Logger.LEVEL_ORDER[level] >= Logger.LEVEL_ORDER[this.minLevel];
  }

  private log(level: LogLevel, component: string, data: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      level,
      logger: `${this.appName}/${component}`,
      data: {
        ...data,
        timestamp: new Date().toISOString(),
      },
    };

    if (this.emitter) {
      this.emitter(entry);
      return;
    }

    // Format: [LEVEL   ] app/component: data
    const levelStr = level.toUpperCase().padEnd(8);
    console.error(`[${levelStr}] ${entry.logger}: ${JSON.stringify(data)}`);
  }

  debug(component: string, data: Record<string, unknown>): void {
    this.log('debug', component, data);
  }

  info(component: string, data: Record<string, unknown>): void {
    this.log('info', component, data);
  }

  warning(component: string, data: Record<string, unknown>): void {
    this.log('warning', component, data);
  }

  error(component: string, data: Record<string, unknown>): void {
    this.log('error', component, data);
  }

  critical(component: string, data: Record<string, unknown>): void {
    this.log('critical', component, data);
  }
}
