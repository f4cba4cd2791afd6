/** True when a string has no visible characters */
export function isBlank(value: string): boolean {
  return value.trim().length === 0;
}

/** Current time as an ISO-8601 string */
export function nowIso(): string {
  return new Date().toISOString();
}
