// Debug Logging Utility for the fiscal printer service
// Centralized logging with environment-aware output

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

export interface LogContext {
  printerId?: string;
  taskId?: string;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  data?: unknown;
  timestamp: string;
  component?: string;
  printerId?: string;
  taskId?: string;
}

class DebugLogger {
  private static instance: DebugLogger | undefined;
  private currentLevel: LogLevel = LogLevel.INFO;

  static getInstance(): DebugLogger {
    if (!DebugLogger.instance) {
      DebugLogger.instance = new DebugLogger();
    }
    return DebugLogger.instance;
  }

  constructor() {
    // Set log level based on environment
    this.setLogLevel(this.getEnvironmentLogLevel());
  }

  private getEnvironmentLogLevel(): LogLevel {
    const env = process.env.NODE_ENV;
    const debugMode = process.env.DEBUG_LOGGING === 'true';

    if (debugMode) return LogLevel.DEBUG;
    if (env === 'development') return LogLevel.DEBUG;
    if (env === 'test') return LogLevel.WARN;
    return LogLevel.INFO;
  }

  setLogLevel(level: LogLevel): void {
    this.currentLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= this.currentLevel;
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    data?: unknown,
    component?: string,
    context?: LogContext
  ): LogEntry {
    return {
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
      component,
      printerId: context?.printerId,
      taskId: context?.taskId,
    };
  }

  private formatMessage(entry: LogEntry): string {
    const timestamp = new Date(entry.timestamp).toLocaleTimeString();
    const component = entry.component ? `[${entry.component}]` : '';
    const printer = entry.printerId ? `[Printer:${entry.printerId}]` : '';
    const task = entry.taskId ? `[Task:${entry.taskId}]` : '';

    return `${timestamp} ${component}${printer}${task} ${entry.message}`;
  }

  debug(message: string, data?: unknown, component?: string, context?: LogContext): void {
    if (!this.shouldLog(LogLevel.DEBUG)) return;

    const entry = this.createLogEntry(LogLevel.DEBUG, message, data, component, context);

    console.debug(`🐛 ${this.formatMessage(entry)}`, data ?? '');
  }

  info(message: string, data?: unknown, component?: string, context?: LogContext): void {
    if (!this.shouldLog(LogLevel.INFO)) return;

    const entry = this.createLogEntry(LogLevel.INFO, message, data, component, context);

    console.info(`ℹ️ ${this.formatMessage(entry)}`, data ?? '');
  }

  warn(message: string, data?: unknown, component?: string, context?: LogContext): void {
    if (!this.shouldLog(LogLevel.WARN)) return;

    const entry = this.createLogEntry(LogLevel.WARN, message, data, component, context);

    console.warn(`⚠️ ${this.formatMessage(entry)}`, data ?? '');
  }

  error(message: string, data?: unknown, component?: string, context?: LogContext): void {
    if (!this.shouldLog(LogLevel.ERROR)) return;

    const entry = this.createLogEntry(LogLevel.ERROR, message, data, component, context);

    console.error(`❌ ${this.formatMessage(entry)}`, data ?? '');
  }

  // Specialized logging methods for common fiscal operations
  jobOperation(operation: string, taskId: string, printerId?: string, data?: unknown): void {
    this.info(`Job ${operation}`, data, 'PrintJobQueue', { taskId, printerId });
  }

  receiptOperation(operation: string, printerId: string, data?: unknown): void {
    this.debug(`Receipt ${operation}`, data, 'FiscalPrinterDriver', { printerId });
  }

  detectOperation(operation: string, data?: unknown): void {
    this.info(`Detect ${operation}`, data, 'FiscalServiceController');
  }
}

// Create and export singleton instance
export const debugLogger = DebugLogger.getInstance();

