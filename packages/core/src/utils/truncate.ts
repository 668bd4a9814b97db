/**
 * Shorten a secret or long value for log output: `abcdefghij..`
 */
export function truncate(value: string, length: number): string {
  return value.length > length ? `${value.slice(0, length)}..` : value;
}
