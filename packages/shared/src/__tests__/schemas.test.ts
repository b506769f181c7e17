import { describe, it, expect } from 'vitest';
import {
  connectResultSchema,
  historyResultSchema,
  pushSchema,
  subscribeResultSchema,
  validateFrame,
} from '../validation/schemas.js';

describe('wire schemas', () => {
  it('should default optional connect result fields', () => {
    const result = validateFrame(connectResultSchema, { client: 'c1' });

    expect(result).toEqual({
      success: true,
      data: { client: 'c1', version: '', expires: false, ttl: 0, ping: 0, pong: false },
    });
  });

  it('should reject a connect result without client id', () => {
    const result = validateFrame(connectResultSchema, { version: '5.0.0' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toContain('client:');
    }
  });

  it('should default subscribe result publications to an empty list', () => {
    const result = validateFrame(subscribeResultSchema, { recoverable: true, epoch: 'e1', offset: 3 });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.publications).toEqual([]);
      expect(result.data.recovered).toBe(false);
      expect(result.data.offset).toBe(3);
    }
  });

  it('should default publication offsets to zero', () => {
    const result = validateFrame(pushSchema, { channel: 'news', pub: { data: { text: 'hi' } } });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.pub).toEqual({ data: { text: 'hi' }, offset: 0 });
    }
  });

  it('should report the path of an invalid field', () => {
    const result = validateFrame(pushSchema, { channel: 'news', pub: { data: 1, offset: -1 } });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toMatch(/^pub\.offset: /);
    }
  });

  it('should reject offsets that cannot be represented exactly', () => {
    const tooBig = Number.MAX_SAFE_INTEGER + 1;

    expect(validateFrame(pushSchema, { channel: 'news', pub: { data: 1, offset: tooBig } }).success).toBe(false);
    expect(validateFrame(subscribeResultSchema, { offset: tooBig }).success).toBe(false);
    expect(validateFrame(historyResultSchema, { offset: tooBig }).success).toBe(false);
    expect(validateFrame(historyResultSchema, { offset: Number.MAX_SAFE_INTEGER }).success).toBe(true);
  });
});
