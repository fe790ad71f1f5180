// utils.ts
// Small numeric helpers and config coercion shared by the core and the server.

/** Callback receiving a human-readable warning about a repaired value. */
export type WarnFn = (msg: string) => void;

/**
 * Constrains a value to the inclusive range [a, b].
 * @param {number} x
 * @param {number} a
 * @param {number} b
 * @returns {number}
 */
export function clamp(x: number, a: number, b: number): number {
  return Math.max(a, Math.min(b, x));
}

/**
 * Formats a number to a fixed number of decimal places.  Integers are rounded.
 * @param {number} x
 * @param {number} decimals
 * @returns {string}
 */
export function fmtNumber(x: number, decimals: number): string {
  if (decimals === 0) return String(Math.round(x));
  return Number(x).toFixed(decimals);
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim()) return Number(value);
  return Number.NaN;
}

/**
 * Reads an integer setting, falling back or clamping with a warning.
 */
export function coerceInt(
  name: string,
  value: unknown,
  fallback: number,
  min: number,
  max: number,
  warn?: WarnFn
): number {
  if (value === undefined || value === null) {
    return fallback;
  }
  const parsed = toNumber(value);
  if (!Number.isFinite(parsed)) {
    warn?.(`${name} is invalid; using ${fallback}.`);
    return fallback;
  }
  const clamped = clamp(Math.floor(parsed), min, max);
  if (clamped !== parsed) {
    warn?.(`${name} was clamped to ${clamped}.`);
  }
  return clamped;
}

/**
 * Reads a real-valued setting, falling back or clamping with a warning.
 */
export function coerceNumber(
  name: string,
  value: unknown,
  fallback: number,
  min: number,
  max: number,
  warn?: WarnFn
): number {
  if (value === undefined || value === null) {
    return fallback;
  }
  const parsed = toNumber(value);
  if (!Number.isFinite(parsed)) {
    warn?.(`${name} is invalid; using ${fallback}.`);
    return fallback;
  }
  const clamped = clamp(parsed, min, max);
  if (clamped !== parsed) {
    warn?.(`${name} was clamped to ${clamped}.`);
  }
  return clamped;
}

/**
 * Reads one of a fixed set of string values.
 */
export function coerceChoice<T extends string>(
  name: string,
  value: unknown,
  choices: readonly T[],
  fallback: T,
  warn?: WarnFn
): T {
  if (value === undefined || value === null) return fallback;
  const match = choices.find(choice => choice === value);
  if (match !== undefined) return match;
  warn?.(`${name} "${String(value)}" is invalid; using ${fallback}.`);
  return fallback;
}

/**
 * Reads a boolean from a boolean or a "true"/"false"/"1"/"0" string.
 */
export function coerceBool(name: string, value: unknown, fallback: boolean, warn?: WarnFn): boolean {
  if (value === undefined || value === null) return fallback;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const lower = value.trim().toLowerCase();
    if (lower === 'true' || lower === '1' || lower === 'yes') return true;
    if (lower === 'false' || lower === '0' || lower === 'no') return false;
  }
  warn?.(`${name} is invalid; using ${fallback}.`);
  return fallback;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
