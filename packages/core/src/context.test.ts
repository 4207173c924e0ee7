/**
 * Tests for ErrorContext
 */

import { describe, expect, it } from 'vitest';
import { ErrorCategory } from './category.js';
import { ErrorContext } from './context.js';
import { isErr, isOk } from './utils/result.js';

const newContext = (): ErrorContext =>
  new ErrorContext('api_call', ErrorCategory.network(), 'Timeout');

describe('ErrorContext', () => {
  describe('creation', () => {
    it('should start at attempt 1 with empty metadata', () => {
      const context = newContext();

      expect(context.operation).toBe('api_call');
      expect(context.message).toBe('Timeout');
      expect(ErrorCategory.categoryName(context.category)).toBe('Network');
      expect(context.attemptCount).toBe(1);
      expect(context.metadataCount()).toBe(0);
      expect(context.occurredAt).toBeInstanceOf(Date);
    });

    it('should generate distinct ids', () => {
      expect(newContext().errorId).not.toBe(newContext().errorId);
    });
  });

  describe('attempts', () => {
    it('should increment without an upper bound', () => {
      const context = newContext();

      context.incrementAttempt();
      expect(context.attemptCount).toBe(2);

      for (let i = 0; i < 10; i++) {
        context.incrementAttempt();
      }
      expect(context.attemptCount).toBe(12);
    });
  });

  describe('metadata', () => {
    it('should support chained inserts', () => {
      const context = newContext()
        .withMetadata('endpoint', '/api/users')
        .withMetadata('timeout_ms', 5000);

      expect(context.metadataCount()).toBe(2);
      expect(context.getMetadata('endpoint')).toBe('/api/users');
      expect(context.getMetadata('timeout_ms')).toBe(5000);
    });

    it('should keep the last write for a key', () => {
      const context = newContext();

      context.addMetadata('retry_reason', 'timeout');
      context.addMetadata('retry_reason', { code: 504, upstream: ['edge', 'origin'] });

      expect(context.metadataCount()).toBe(1);
      expect(context.getMetadata('retry_reason')).toEqual({
        code: 504,
        upstream: ['edge', 'origin']
      });
    });

    it('should report, remove and clear entries', () => {
      const context = newContext().withMetadata('a', 1).withMetadata('b', null);

      expect(context.hasMetadata('b')).toBe(true);
      expect(context.hasMetadata('c')).toBe(false);
      expect(context.getMetadata('c')).toBeUndefined();

      expect(context.removeMetadata('a')).toBe(true);
      expect(context.removeMetadata('a')).toBe(false);
      expect(context.metadataCount()).toBe(1);

      context.clearMetadata();
      expect(context.metadataCount()).toBe(0);
      expect(context.metadata).toEqual({});
    });

    it('should return a snapshot of the entries', () => {
      const context = newContext().withMetadata('user_id', 'u-1');
      const snapshot = context.metadata;

      context.addMetadata('region', 'eu');

      expect(snapshot).toEqual({ user_id: 'u-1' });
      expect(context.metadata).toEqual({ user_id: 'u-1', region: 'eu' });
    });
  });

  describe('serialization', () => {
    it('should encode every field except the category', () => {
      const occurredAt = new Date('2024-01-01T12:00:00.000Z');
      const context = new ErrorContext('sync', ErrorCategory.transient(), 'Database error: x', {
        errorId: '6f1c2d4e-8a9b-4c0d-9e1f-2a3b4c5d6e7f',
        occurredAt,
        attemptCount: 3,
        metadata: { shard: 7 }
      });

      expect(context.toJSON()).toEqual({
        errorId: '6f1c2d4e-8a9b-4c0d-9e1f-2a3b4c5d6e7f',
        operation: 'sync',
        message: 'Database error: x',
        occurredAt: '2024-01-01T12:00:00.000Z',
        attemptCount: 3,
        metadata: { shard: 7 }
      });
    });

    it('should restore a context with the Unknown category', () => {
      const original = newContext().withMetadata('endpoint', '/api/users');
      original.incrementAttempt();

      const result = ErrorContext.parse(JSON.stringify(original));

      expect(isOk(result)).toBe(true);
      if (isOk(result)) {
        const restored = result.value;
        expect(restored.errorId).toBe(original.errorId);
        expect(restored.operation).toBe('api_call');
        expect(restored.message).toBe('Timeout');
        expect(restored.attemptCount).toBe(2);
        expect(restored.occurredAt.getTime()).toBe(original.occurredAt.getTime());
        expect(restored.getMetadata('endpoint')).toBe('/api/users');
        expect(ErrorCategory.categoryName(restored.category)).toBe('Unknown');
      }
    });

    it('should fold invalid payloads into an internal error', () => {
      const result = ErrorContext.fromJSON({ operation: 'x' });

      expect(isErr(result)).toBe(true);
      if (isErr(result)) {
        expect(result.error.kind).toBe('Internal');
        expect(result.error.message).toMatch(/^Internal error: JSON serialization error: /);
      }
    });

    it('should fold malformed JSON into an internal error', () => {
      const result = ErrorContext.parse('');

      expect(isErr(result)).toBe(true);
      if (isErr(result)) {
        expect(result.error.kind).toBe('Internal');
      }
    });
  });
});
