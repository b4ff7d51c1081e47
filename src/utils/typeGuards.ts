/**
 * Shared type guard utilities.
 */

/**
 * Type guard to check if a value is a plain object (not null, not array).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function hasField(record: Record<string, unknown>, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, name);
}

/**
 * Assigns an own, enumerable key. Plain assignment would route `__proto__`
 * to the prototype setter instead.
 */
export function setField<T>(record: Record<string, T>, name: string, value: T): void {
  Object.defineProperty(record, name, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}
