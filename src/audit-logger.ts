/**
 * Audit Logger - Records report validation verdicts
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { LogEntry, LogReadOptions } from './types';

function isLogEntry(value: unknown): value is LogEntry {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (!('timestamp' in value) || !('report' in value) || !('valid' in value)) {
    return false;
  }
  return typeof value.timestamp === 'string' &&
    typeof value.report === 'string' &&
    typeof value.valid === 'boolean';
}

export class AuditLogger {
  private logPath: string;
  private maxSize: number;

  constructor(logPath?: string, maxSize: number = 10 * 1024 * 1024) {
    // Default to ~/.metar-inspect/validation.log
    this.logPath = logPath || path.join(os.homedir(), '.metar-inspect', 'validation.log');
    this.maxSize = maxSize;
  }

  /**
   * Append a validation entry as one JSON line
   */
  log(entry: LogEntry): void {
    try {
      this.ensureLogDirectory();

      // Check if rotation is needed before writing
      if (this.shouldRotate()) {
        this.rotate();
      }

      fs.appendFileSync(this.logPath, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (error) {
      // Log writes never fail a validation
      console.error(`Warning: Failed to write audit log: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Rename the current log to a timestamped backup
   */
  rotate(): void {
    try {
      if (!fs.existsSync(this.logPath)) {
        return;
      }

      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      fs.renameSync(this.logPath, `${this.logPath}.${timestamp}`);

      // New log file will be created on next write
    } catch (error) {
      console.error(`Warning: Failed to rotate audit log: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Read log entries, most recent last
   */
  read(options?: LogReadOptions): LogEntry[] {
    try {
      if (!fs.existsSync(this.logPath)) {
        return [];
      }

      const content = fs.readFileSync(this.logPath, 'utf-8');
      const lines = content.trim().split('\n').filter(line => line.length > 0);

      const entries: LogEntry[] = [];
      for (const line of lines) {
        let parsed: unknown;
        try {
          parsed = JSON.parse(line);
        } catch (parseError) {
          console.error(`Warning: Invalid JSON in audit log: ${line}`);
          continue;
        }
        if (isLogEntry(parsed)) {
          entries.push(parsed);
        } else {
          console.error(`Warning: Unexpected entry in audit log: ${line}`);
        }
      }

      // Apply filters
      let filtered = entries;

      if (options?.valid !== undefined) {
        filtered = filtered.filter(e => e.valid === options.valid);
      }

      const since = options?.since;
      if (since) {
        filtered = filtered.filter(e => new Date(e.timestamp) >= since);
      }

      // Apply limit (default 50, most recent entries)
      const limit = options?.limit ?? 50;
      if (filtered.length > limit) {
        filtered = filtered.slice(-limit);
      }

      return filtered;
    } catch (error) {
      console.error(`Warning: Failed to read audit log: ${error instanceof Error ? error.message : String(error)}`);
      return [];
    }
  }

  getLogPath(): string {
    return this.logPath;
  }

  private ensureLogDirectory(): void {
    const logDir = path.dirname(this.logPath);

    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
  }

  /**
   * Check if log file should be rotated
   */
  private shouldRotate(): boolean {
    try {
      if (!fs.existsSync(this.logPath)) {
        return false;
      }
      return fs.statSync(this.logPath).size >= this.maxSize;
    } catch (error) {
      console.error(`Warning: Cannot stat audit log: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }
}
