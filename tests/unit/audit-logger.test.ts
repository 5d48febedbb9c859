/**
 * Unit tests for AuditLogger
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { AuditLogger } from '../../src/audit-logger';
import type { LogEntry } from '../../src/types';

describe('AuditLogger', () => {
  let tempDir: string;
  let logPath: string;
  let logger: AuditLogger;

  const entry = (report: string, valid: boolean, timestamp = new Date().toISOString()): LogEntry => ({
    timestamp,
    report,
    valid,
    rule: valid ? null : 'qnh-present',
    error: valid ? null : 'Missing QNH group'
  });

  beforeEach(() => {
    // Create temporary directory for test logs
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'metar-inspect-test-'));
    logPath = path.join(tempDir, 'validation.log');
    logger = new AuditLogger(logPath);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    // Clean up temporary directory
    if (fs.existsSync(tempDir)) {
      fs.rmSync(tempDir, { recursive: true, force: true });
    }
  });

  describe('log()', () => {
    it('should create log directory if it does not exist', () => {
      const nestedLogPath = path.join(tempDir, 'nested', 'dir', 'validation.log');
      const nestedLogger = new AuditLogger(nestedLogPath);

      nestedLogger.log(entry('METAR ZBAA 250500Z 21009MPS 9999 Q1018', true));

      expect(fs.existsSync(nestedLogPath)).toBe(true);
    });

    it('should write log entry as single-line JSON', () => {
      const written = entry('METAR ZBAA 250500Z 21009MPS 9999 NSC 18/08', false, '2024-05-25T05:00:00.000Z');

      logger.log(written);

      const lines = fs.readFileSync(logPath, 'utf-8').trim().split('\n');
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0])).toEqual(written);
    });

    it('should append multiple entries', () => {
      logger.log(entry('METAR ZBAA 250500Z 21009MPS 9999 Q1018', true));
      logger.log(entry('METAR ZBAA 250530Z 21009MPS 9999 Q1018', true));

      const lines = fs.readFileSync(logPath, 'utf-8').trim().split('\n');
      expect(lines).toHaveLength(2);
    });

    it('should continue operation if log write fails', () => {
      const warn = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      // A regular file where the log directory should be
      const blocker = path.join(tempDir, 'blocker');
      fs.writeFileSync(blocker, '', 'utf-8');
      const invalidLogger = new AuditLogger(path.join(blocker, 'validation.log'));

      expect(() => invalidLogger.log(entry('METAR ZBAA 250500Z', false))).not.toThrow();
      expect(warn).toHaveBeenCalledWith(expect.stringContaining('Warning: Failed to write audit log'));
    });
  });

  describe('rotate()', () => {
    it('should rotate log file when it exceeds maxSize', () => {
      const smallLogger = new AuditLogger(logPath, 100);

      for (let i = 0; i < 5; i++) {
        smallLogger.log(entry(`METAR ZBAA 25050${i}Z 21009MPS 9999 Q1018`, true));
      }

      const backupFiles = fs.readdirSync(tempDir).filter(f => f.startsWith('validation.log.'));
      expect(backupFiles.length).toBeGreaterThan(0);
    });

    it('should create timestamped backup files', () => {
      logger.log(entry('METAR ZBAA 250500Z 21009MPS 9999 Q1018', true));

      logger.rotate();

      const backupFiles = fs.readdirSync(tempDir).filter(f => f.startsWith('validation.log.'));
      expect(backupFiles).toHaveLength(1);
      expect(backupFiles[0]).toMatch(/validation\.log\.\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}/);
      expect(fs.existsSync(logPath)).toBe(false);
    });

    it('should do nothing when the log does not exist', () => {
      expect(() => logger.rotate()).not.toThrow();
      expect(fs.readdirSync(tempDir)).toEqual([]);
    });
  });

  describe('read()', () => {
    beforeEach(() => {
      logger.log(entry('METAR ZBAA 250500Z 21009MPS 9999 NSC 18/08', false, '2024-05-25T05:00:00.000Z'));
      logger.log(entry('METAR ZBAA 250530Z 21009MPS 9999 Q1018', true, '2024-05-25T05:30:00.000Z'));
      logger.log(entry('METAR ZBAA 250600Z 21009MPS 9999 Q1017', true, '2024-05-25T06:00:00.000Z'));
    });

    it('should read all entries', () => {
      expect(logger.read()).toHaveLength(3);
    });

    it('should filter by verdict', () => {
      const entries = logger.read({ valid: false });

      expect(entries).toHaveLength(1);
      expect(entries[0].rule).toBe('qnh-present');
    });

    it('should filter by date', () => {
      const entries = logger.read({ since: new Date('2024-05-25T05:45:00.000Z') });

      expect(entries).toHaveLength(1);
      expect(entries[0].report).toBe('METAR ZBAA 250600Z 21009MPS 9999 Q1017');
    });

    it('should limit results to most recent entries', () => {
      const entries = logger.read({ limit: 2 });

      expect(entries.map(e => e.timestamp)).toEqual([
        '2024-05-25T05:30:00.000Z',
        '2024-05-25T06:00:00.000Z'
      ]);
    });

    it('should return empty array for non-existent log', () => {
      const emptyLogger = new AuditLogger(path.join(tempDir, 'nonexistent.log'));

      expect(emptyLogger.read()).toEqual([]);
    });

    it('should skip invalid JSON lines', () => {
      const warn = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      fs.appendFileSync(logPath, 'invalid json line\n', 'utf-8');

      expect(logger.read()).toHaveLength(3);
      expect(warn).toHaveBeenCalledWith('Warning: Invalid JSON in audit log: invalid json line');
    });

    it('should skip entries of the wrong shape', () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      fs.appendFileSync(logPath, '{"timestamp":"2024-05-25T07:00:00.000Z"}\n', 'utf-8');

      expect(logger.read()).toHaveLength(3);
    });
  });

  it('should report its log path', () => {
    expect(logger.getLogPath()).toBe(logPath);
  });
});
