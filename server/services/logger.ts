import type { InsertSystemLog } from '@shared/schema';

export type LogLevel = 'info' | 'warning' | 'error' | 'success';

export interface LogSink {
  createSystemLog(log: InsertSystemLog): Promise<unknown>;
}

/**
 * Console logger that also persists entries to the system_logs table once a
 * storage sink is attached.
 */
export class Logger {
  private static sink: LogSink | null = null;

  static attach(sink: LogSink): void {
    Logger.sink = sink;
  }

  static info(message: string, component: string, metadata?: Record<string, unknown>): Promise<void> {
    return Logger.log('info', message, component, metadata);
  }

  static success(message: string, component: string, metadata?: Record<string, unknown>): Promise<void> {
    return Logger.log('success', message, component, metadata);
  }

  static warning(message: string, component: string, metadata?: Record<string, unknown>): Promise<void> {
    return Logger.log('warning', message, component, metadata);
  }

  static error(message: string, component: string, metadata?: Record<string, unknown>): Promise<void> {
    return Logger.log('error', message, component, metadata);
  }

  private static async log(
    level: LogLevel,
    message: string,
    component: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    const line = `[${component}] ${message}`;
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warning') {
      console.warn(line);
    } else {
      console.log(line);
    }

    if (!Logger.sink) return;

    try {
      await Logger.sink.createSystemLog({ level, message, component, metadata: metadata ?? null });
    } catch (error) {
      // A failed log write is reported on the console only
      console.error(`[logger] Failed to persist log entry: ${error}`);
    }
  }
}
