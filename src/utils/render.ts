/**
 * Payload rendering for error messages and `toString()`.
 *
 * @module render
 */

import type { RenderOptions } from '../config';
import { DEFAULT_RENDER_CONFIG, RenderConfigSchema } from '../config';

/**
 * Render a payload for debugging output.
 *
 * Strings are quoted, errors show their name and message, arrays and plain
 * objects are serialized as JSON. Anything longer than `maxPayloadLength`
 * is cut and ends with an ellipsis.
 *
 * @param value - The payload to render
 * @param options - Overrides for the default render config
 * @returns The rendered payload
 * @throws {ZodError} If `options` are invalid
 *
 * @example
 * ```typescript
 * renderPayload("bad"); // '"bad"'
 * renderPayload({ code: 42 }); // '{"code":42}'
 * renderPayload("abcdefghijkl", { maxPayloadLength: 10 }); // '"abcdefgh…'
 * ```
 */
export function renderPayload(value: unknown, options?: RenderOptions): string {
  const { maxPayloadLength } =
    options === undefined ? DEFAULT_RENDER_CONFIG : RenderConfigSchema.parse(options);
  const rendered = describeValue(value);

  if (rendered.length <= maxPayloadLength) {
    return rendered;
  }
  return `${rendered.slice(0, maxPayloadLength - 1)}…`;
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'bigint') {
    return `${value}n`;
  }
  if (value instanceof Error) {
    return `${value.name}: ${value.message}`;
  }
  if (Array.isArray(value) || isPlainObject(value)) {
    return toJson(value);
  }
  return String(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function toJson(value: unknown[] | Record<string, unknown>): string {
  try {
    // undefined for a root whose toJSON returns undefined
    return JSON.stringify(value) ?? String(value);
  } catch {
    // circular structures and bigint members
    return Array.isArray(value) ? '[Array]' : '[Object]';
  }
}
