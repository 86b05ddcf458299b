import { randomUUID } from 'node:crypto';

/** Generate a random UUIDv4. */
export function generateId(): string {
  return randomUUID();
}

/** Current time as RFC 3339 string. */
export function now(): string {
  return new Date().toISOString();
}

/** Type guard: checks that a value is a non-null object. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Human-readable text for any thrown value. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
