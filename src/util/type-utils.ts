/**
 * Name of a value's type for messages: 'array', 'map' and 'null' are told
 * apart from 'object'.
 */
export function getDataType(value: unknown): string {
  if (Array.isArray(value)) return 'array';
  if (value === null) return 'null';
  if (value instanceof Map) return 'map';
  return typeof value;
}
