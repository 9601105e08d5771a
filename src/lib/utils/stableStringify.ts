type JsonPrimitive = string | number | boolean | null;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function serialize(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => serialize(item === undefined ? null : item)).join(',')}]`;
  }

  if (isPlainObject(value)) {
    // Absent optional fields are left out, as JSON.stringify does
    const entries = Object.keys(value)
      .sort()
      .filter((key) => value[key] !== undefined)
      .map((key) => `${JSON.stringify(key)}:${serialize(value[key])}`);
    return `{${entries.join(',')}}`;
  }

  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new TypeError(`Cannot serialize non-finite number ${value}`);
  }

  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || value === null) {
    const primitive: JsonPrimitive = value;
    return JSON.stringify(primitive);
  }

  throw new TypeError(`Cannot serialize value of type ${typeof value}`);
}

/**
 * JSON with object keys sorted at every level, so equal values always give
 * the same string.
 */
export default function stableStringify(value: unknown): string {
  return serialize(value);
}
