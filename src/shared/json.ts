export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Parse a stored JSON column, keeping only object values. */
export function parseJsonObject(json: string | null): Record<string, unknown> | null {
  if (json === null) return null;
  const value: unknown = JSON.parse(json);
  return isPlainObject(value) ? value : null;
}

/**
 * Serialize a value for a stored JSON column, keeping it exactly as given.
 * Only a true cycle (an object inside itself) is cut, as "[Circular]";
 * an object shared between siblings is written out each time. Bigints are
 * written as strings.
 */
export function toJsonText(value: unknown): string {
  const ancestors: unknown[] = [];
  const json = JSON.stringify(value, function (this: unknown, _key: string, current: unknown) {
    if (typeof current === 'bigint') return current.toString();
    if (typeof current !== 'object' || current === null) return current;
    while (ancestors.length > 0 && ancestors[ancestors.length - 1] !== this) {
      ancestors.pop();
    }
    if (ancestors.includes(current)) return '[Circular]';
    ancestors.push(current);
    return current;
  });
  return typeof json === 'string' ? json : 'null';
}
