/**
 * Unit tests for the structured logger.
 *
 * @module logging/logger.test
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  createLogger,
  isLogLevel,
  REDACTED,
  type LogEntry,
  type LogLevel,
  type LogOutput,
} from './logger.js';

describe('Logger', () => {
  let captured: LogEntry[];
  let output: LogOutput;

  beforeEach(() => {
    captured = [];
    output = (entry: LogEntry) => {
      captured.push(entry);
    };
  });

  // ─── JSON Structured Output ────────────────────────────────────────────

  describe('JSON structured output', () => {
    it('should write one JSON line to stdout by default', () => {
      const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
      const logger = createLogger({ service: 'test-svc' });

      logger.info('hello');

      expect(writeSpy).toHaveBeenCalledOnce();
      const raw = writeSpy.mock.calls[0]?.[0];
      expect(typeof raw).toBe('string');
      const parsed: unknown = JSON.parse(String(raw).trim());
      expect(parsed).toMatchObject({ level: 'info', message: 'hello', service: 'test-svc' });

      writeSpy.mockRestore();
    });

    it('should include the base context in every entry', () => {
      const logger = createLogger({
        service: 'api',
        output,
        context: { correlationId: 'corr-123', userId: 'user-1', tenantId: 'tenant-1' },
      });

      logger.info('request received');

      expect(captured).toEqual([
        {
          timestamp: expect.any(String),
          level: 'info',
          message: 'request received',
          service: 'api',
          correlationId: 'corr-123',
          userId: 'user-1',
          tenantId: 'tenant-1',
        },
      ]);
    });

    it('should default the service name and generate a correlation id', () => {
      createLogger({ output }).warn('no context');

      expect(captured[0]?.service).toBe('patient-access-engine');
      expect(captured[0]?.correlationId).toMatch(/^[0-9a-f-]{36}$/);
    });
  });

  describe('timestamps', () => {
    it('should stamp entries from the injected clock', () => {
      const logger = createLogger({ output, now: () => new Date('2025-03-01T09:00:00.000Z') });

      logger.child({ patientId: 'patient-1' }).info('emergency access used');

      expect(captured[0]).toMatchObject({
        timestamp: '2025-03-01T09:00:00.000Z',
        patientId: 'patient-1',
      });
    });
  });

  // ─── Levels ────────────────────────────────────────────────────────────

  describe('level filtering', () => {
    it('should drop entries below the minimum level', () => {
      const logger = createLogger({ output, level: 'warn' });

      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');
      logger.fatal('f');

      expect(captured.map((e) => e.level)).toEqual(['warn', 'error', 'fatal']);
    });

    it.each<[unknown, boolean]>([
      ['debug', true],
      ['fatal', true],
      ['trace', false],
      [3, false],
    ])('isLogLevel(%j) should be %s', (value, expected) => {
      expect(isLogLevel(value)).toBe(expected);
    });

    it('should accept every declared level', () => {
      const levels: LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];
      expect(levels.every(isLogLevel)).toBe(true);
    });
  });

  // ─── Metadata ──────────────────────────────────────────────────────────

  describe('metadata', () => {
    it('should redact secret-bearing keys', () => {
      createLogger({ output }).info('login', {
        username: 'alice',
        password: 'hunter2',
        refreshToken: 'abc',
        Authorization: 'Bearer abc',
      });

      expect(captured[0]?.metadata).toEqual({
        username: 'alice',
        password: REDACTED,
        refreshToken: REDACTED,
        Authorization: REDACTED,
      });
    });

    it('should redact nested keys and leave arrays alone', () => {
      createLogger({ output }).info('refresh', {
        session: { id: 'session-1', refreshTokenHash: 'ab12' },
        scopes: ['records.read'],
      });

      expect(captured[0]?.metadata).toEqual({
        session: { id: 'session-1', refreshTokenHash: REDACTED },
        scopes: ['records.read'],
      });
    });

    it('should omit empty metadata', () => {
      createLogger({ output }).info('bare', {});

      expect(captured[0]).not.toHaveProperty('metadata');
    });

    it('should serialise errors with their code', () => {
      const error = Object.assign(new Error('pool exhausted'), { code: '53300' });

      createLogger({ output }).error('query failed', error, { table: 'users' });

      expect(captured[0]?.error).toMatchObject({
        name: 'Error',
        message: 'pool exhausted',
        code: '53300',
      });
      expect(captured[0]?.metadata).toEqual({ table: 'users' });
    });
  });

  // ─── Child Loggers ─────────────────────────────────────────────────────

  describe('child', () => {
    it('should merge context and keep the level and sink', () => {
      const parent = createLogger({
        output,
        level: 'info',
        context: { correlationId: 'corr-1', tenantId: 'tenant-1' },
      });
      const child = parent.child({ service: 'auth', operation: 'login' });

      child.debug('hidden');
      child.info('shown');

      expect(captured).toHaveLength(1);
      expect(captured[0]).toMatchObject({
        service: 'auth',
        operation: 'login',
        correlationId: 'corr-1',
        tenantId: 'tenant-1',
      });
    });
  });
});
