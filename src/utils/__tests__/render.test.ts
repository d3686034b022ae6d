/**
 * Unit tests for payload rendering and its config.
 */

import { ZodError } from 'zod';
import { renderPayload } from '../render';
import { DEFAULT_RENDER_CONFIG, RenderConfigSchema } from '../../config';
import { UnwrapOnFailureError } from '../../errors';
import { failure } from '../result';

describe('renderPayload', () => {
  it('should quote strings', () => {
    expect(renderPayload('bad')).toBe('"bad"');
  });

  it('should print numbers, booleans and nullish values', () => {
    expect(renderPayload(10)).toBe('10');
    expect(renderPayload(false)).toBe('false');
    expect(renderPayload(null)).toBe('null');
    expect(renderPayload(undefined)).toBe('undefined');
  });

  it('should suffix bigints', () => {
    expect(renderPayload(12n)).toBe('12n');
  });

  it('should show error name and message', () => {
    expect(renderPayload(new TypeError('boom'))).toBe('TypeError: boom');
  });

  it('should serialize arrays and plain objects as JSON', () => {
    expect(renderPayload([1, 'a'])).toBe('[1,"a"]');
    expect(renderPayload({ code: 42 })).toBe('{"code":42}');
  });

  it('should fall back when JSON serialization fails', () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    expect(renderPayload(circular)).toBe('[Object]');
  });

  it('should fall back to String when toJSON yields nothing', () => {
    expect(renderPayload({ toJSON: () => undefined })).toBe('[object Object]');
  });

  it('should still throw UnwrapOnFailureError for a payload whose toJSON yields nothing', () => {
    const result = failure<number, { toJSON: () => undefined }>({ toJSON: () => undefined });

    expect(() => result.unwrap()).toThrow(UnwrapOnFailureError);
    expect(() => result.unwrap()).toThrow('called `unwrap` on a `Failure` value: [object Object]');
    expect(result.toString()).toBe('Failure([object Object])');
  });

  it('should use toString for class instances', () => {
    expect(renderPayload(new Date(0))).toBe(String(new Date(0)));
  });

  it('should truncate long renderings', () => {
    expect(renderPayload('abcdefghijkl', { maxPayloadLength: 10 })).toBe('"abcdefgh…');
    expect(renderPayload('abcdefghijkl', { maxPayloadLength: 10 })).toHaveLength(10);
  });

  it('should leave renderings at the limit untouched', () => {
    expect(renderPayload('abcdef', { maxPayloadLength: 8 })).toBe('"abcdef"');
  });

  it('should reject invalid options', () => {
    expect(() => renderPayload('x', { maxPayloadLength: 2 })).toThrow(ZodError);
  });
});

describe('RenderConfigSchema', () => {
  it('should default maxPayloadLength to 200', () => {
    expect(DEFAULT_RENDER_CONFIG).toEqual({ maxPayloadLength: 200 });
  });

  it('should reject non-integer lengths', () => {
    expect(RenderConfigSchema.safeParse({ maxPayloadLength: 12.5 }).success).toBe(false);
  });
});
