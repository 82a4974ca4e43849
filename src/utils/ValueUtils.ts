import type { CellValue } from '../interfaces/CanonicalTable.js';

// Plain decimal literal: optional sign, digits with optional fraction, optional exponent.
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Interpret a cell as a real number.
 *
 * Behavior:
 * - finite numbers are returned unchanged
 * - text is trimmed and accepted only when it is a decimal literal
 * - `null`, blank text and anything else yields `null`
 *
 * Examples:
 * ```ts
 * parseNumericCell(2.5)     // => 2.5
 * parseNumericCell(' 10 ')  // => 10
 * parseNumericCell('0x10')  // => null
 * parseNumericCell('A')     // => null
 * ```
 */
export function parseNumericCell(cell: CellValue): number | null {
  if (cell === null) return null;
  if (typeof cell === 'number') return Number.isFinite(cell) ? cell : null;
  const trimmed = cell.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

/** True for a non-null, non-array object whose prototype is Object.prototype or null. */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Text form of a cell for labels; null becomes an empty string. */
export function cellToLabel(cell: CellValue): string {
  return cell === null ? '' : String(cell);
}
