/**
 * 📝 日誌輸出
 *
 * 框架內所有輸出都經過 Logger，方便在測試中攔截
 */

import type { Logger } from '../../types/index';

export class ConsoleLogger implements Logger {
  constructor(private readonly verbose: boolean = false) {}

  info(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.warn(`⚠️  ${message}`);
  }

  error(message: string): void {
    console.error(`❌ ${message}`);
  }

  debug(message: string): void {
    if (this.verbose) {
      console.log(`🔍 ${message}`);
    }
  }
}

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export interface LogEntry {
  level: LogLevel;
  message: string;
}

/**
 * 將日誌保存在記憶體中 (測試用)
 */
export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  info(message: string): void {
    this.entries.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.entries.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.entries.push({ level: 'error', message });
  }

  debug(message: string): void {
    this.entries.push({ level: 'debug', message });
  }

  /** 某一等級的所有訊息 */
  messages(level: LogLevel = 'info'): string[] {
    return this.entries.filter(e => e.level === level).map(e => e.message);
  }
}
