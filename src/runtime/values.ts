/** Helpers called by generated `equals`, `hashCode` and `toString` methods. */

export function valueEquals(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  if (a instanceof Uint8Array && b instanceof Uint8Array) {
    return a.length === b.length && a.every((v, i) => v === b[i]);
  }
  return false;
}

function hashString(s: string): number {
  let h = 0;
  for (let i = 0; i < s.length; i++) {
    h = (Math.imul(31, h) + s.charCodeAt(i)) | 0;
  }
  return h;
}

function hashValue(v: unknown): number {
  if (v === null || v === undefined) return 0;
  if (typeof v === 'number') return Number.isInteger(v) ? v | 0 : hashString(String(v));
  if (typeof v === 'boolean') return v ? 1231 : 1237;
  if (v instanceof Date) return hashValue(v.getTime());
  if (typeof v === 'string' || typeof v === 'bigint') return hashString(String(v));
  if (v instanceof Uint8Array) return hashValues(Array.from(v));
  // Objects hash by identity class only; equality decides the rest.
  return hashString(Object.prototype.toString.call(v));
}

/** Order-sensitive combination of value hashes, 31-based. */
export function hashValues(values: readonly unknown[]): number {
  let h = 1;
  for (const v of values) {
    h = (Math.imul(31, h) + hashValue(v)) | 0;
  }
  return h;
}

export function describeValue(v: unknown): string {
  if (v === undefined) return 'undefined';
  if (v === null) return 'null';
  if (v instanceof Date) return v.toISOString();
  if (typeof v === 'object') return Object.prototype.toString.call(v);
  return String(v);
}

/** `Person [id:1, name:Ada]`. */
export function describeEntity(typeName: string, fields: ReadonlyArray<readonly [string, unknown]>): string {
  return `${typeName} [${fields.map(([k, v]) => `${k}:${describeValue(v)}`).join(', ')}]`;
}
