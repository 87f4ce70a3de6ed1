/**
 * Structured Logger - 結構化日誌系統
 * JSON lines, one entry per event, with level filtering and per-component tags.
 * 特性：
 *   - JSON 格式輸出（易於機器解析）
 *   - 日誌級別控制
 *   - runId 追蹤（所有組件共用）
 *   - 錯誤堆棧記錄
 */

import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** Identifies one harvest run across components */
  runId?: string;
  /** Carrier code or label */
  fc?: string;
  /** Page, PDF or API URL */
  url?: string;
  statusCode?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** 最小日誌級別 (default: 'info') */
  minLevel?: LogLevel;
  /** Write every level to stderr, keeping stdout for command output */
  stderr?: boolean;
}

/** 日誌級別優先級 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

/** Run ids in effect, shared by every logger instance */
const runIdStack: string[] = [];

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * 結構化日誌記錄器
 */
export class StructuredLogger {
  private component: string;
  private config: Required<LoggerConfig>;

  constructor(
    component: string,
    config: LoggerConfig = {}
  ) {
    this.component = component;
    this.config = {
      minLevel: config.minLevel || 'info',
      stderr: config.stderr || false
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  private output(entry: LogEntry): void {
    const formatted = JSON.stringify(entry);

    if (this.config.stderr) {
      console.error(formatted);
      return;
    }

    switch (entry.level) {
      case 'error':
        console.error(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'debug':
        console.debug(formatted);
        break;
      case 'info':
      default:
        console.log(formatted);
    }
  }

  debug(message: string, context?: LogContext): void {
    if (!this.shouldLog('debug')) return;

    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    if (!this.shouldLog('info')) return;

    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    if (!this.shouldLog('warn')) return;

    this.log('warn', message, context);
  }

  error(message: string, error?: Error | null, context?: LogContext): void {
    if (!this.shouldLog('error')) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: 'error',
      message,
      component: this.component,
      context: this.enrichContext(context)
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: errorCode(error),
        stack: error.stack
      };
    }

    this.output(entry);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    this.output({
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context: this.enrichContext(context)
    });
  }

  /**
   * 自動添加 runId（如果存在）
   */
  private enrichContext(context?: LogContext): LogContext | undefined {
    const current = this.getCurrentRunId();

    if (!context) {
      return current ? { runId: current } : undefined;
    }

    if (!context.runId && current) {
      return { ...context, runId: current };
    }

    return context;
  }

  /**
   * Start a run; every component logger tags its entries with the id until
   * the matching popRunId
   */
  pushRunId(runId?: string): string {
    const id = runId || randomUUID();
    runIdStack.push(id);
    return id;
  }

  popRunId(): string | undefined {
    return runIdStack.pop();
  }

  getCurrentRunId(): string | undefined {
    return runIdStack[runIdStack.length - 1];
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  setStderr(stderr: boolean): void {
    this.config.stderr = stderr;
  }
}

/**
 * 預設的日誌記錄器實例
 * 按組件分類，便於按階段過濾日誌
 */
export const loggers = {
  fetch: new StructuredLogger('Fetch', { minLevel: 'info' }),
  crawl: new StructuredLogger('Crawl', { minLevel: 'info' }),
  parse: new StructuredLogger('Parse', { minLevel: 'info' }),
  resolve: new StructuredLogger('Resolve', { minLevel: 'info' }),
  geocode: new StructuredLogger('Geocode', { minLevel: 'info' }),
  snapshot: new StructuredLogger('Snapshot', { minLevel: 'info' }),
  harvest: new StructuredLogger('Harvest', { minLevel: 'info' })
};

/**
 * Apply one level and sink to every component logger
 */
export function configureLoggers(options: { minLevel?: LogLevel; stderr?: boolean }): void {
  for (const logger of Object.values(loggers)) {
    if (options.minLevel) logger.setMinLevel(options.minLevel);
    if (options.stderr !== undefined) logger.setStderr(options.stderr);
  }
}

/**
 * 時間格式化輔助函數
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}
