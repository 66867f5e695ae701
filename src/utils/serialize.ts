export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

const CIRCULAR = '[Circular]';

type Slot = { kind: 'value'; value: JsonValue } | { kind: 'omit' };

const omit: Slot = { kind: 'omit' };

function hasToJson(value: object): value is { toJSON: () => unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

function convert(value: unknown, seen: Set<object>): Slot {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return { kind: 'value', value };
    case 'number':
      return { kind: 'value', value: Number.isFinite(value) ? value : String(value) };
    case 'bigint':
      return { kind: 'value', value: value.toString() };
    case 'undefined':
    case 'function':
    case 'symbol':
      return omit;
  }

  if (value === null || typeof value !== 'object') {
    return { kind: 'value', value: null };
  }

  if (value instanceof Date) {
    return { kind: 'value', value: Number.isNaN(value.getTime()) ? null : value.toISOString() };
  }

  if (seen.has(value)) {
    return { kind: 'value', value: CIRCULAR };
  }
  seen.add(value);
  try {
    if (Array.isArray(value) || value instanceof Set) {
      return { kind: 'value', value: convertSequence([...value], seen) };
    }
    if (value instanceof Map) {
      const out: JsonObject = {};
      for (const [k, v] of value) {
        const slot = convert(v, seen);
        if (slot.kind === 'value') {
          out[String(k)] = slot.value;
        }
      }
      return { kind: 'value', value: out };
    }
    if (value instanceof Error) {
      return { kind: 'value', value: { name: value.name, message: value.message } };
    }
    if (hasToJson(value)) {
      return convert(value.toJSON(), seen);
    }
    const out: JsonObject = {};
    for (const [k, v] of Object.entries(value)) {
      const slot = convert(v, seen);
      if (slot.kind === 'value') {
        out[k] = slot.value;
      }
    }
    return { kind: 'value', value: out };
  } finally {
    seen.delete(value);
  }
}

function convertSequence(items: unknown[], seen: Set<object>): JsonValue[] {
  return items.map((item) => {
    const slot = convert(item, seen);
    return slot.kind === 'value' ? slot.value : null;
  });
}

/**
 * Convert an arbitrary value into plain JSON data. Dates become ISO-8601
 * strings, sets and maps become arrays and objects, and anything that cannot
 * be represented is dropped (object members) or nulled (array items).
 */
export function toJsonValue(value: unknown): JsonValue {
  const slot = convert(value, new Set());
  return slot.kind === 'value' ? slot.value : null;
}

/**
 * Like `toJsonValue`, but always yields an object: non-object results are
 * wrapped as `{ result: value }`.
 */
export function toJsonObject(value: unknown): JsonObject {
  const json = toJsonValue(value);
  if (json !== null && typeof json === 'object' && !Array.isArray(json)) {
    return json;
  }
  return { result: json };
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a stored JSON column that is expected to hold an object.
 */
export function parseJsonObject(text: string | null): JsonObject | null {
  if (text === null || text === '') {
    return null;
  }
  const parsed: unknown = JSON.parse(text);
  return isJsonObject(parsed) ? parsed : { result: toJsonValue(parsed) };
}
