/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Wire encodings of DXF scalar values.
 *
 * Parsers return null when the text is not a valid value of the class;
 * callers attach location information and raise the error.
 */

import { GroupCodeClass } from './group-codes.js';

const DOUBLE_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const HANDLE_PATTERN = /^[0-9A-Fa-f]+$/;

const INTEGER_LIMITS: Record<GroupCodeClass.Int16 | GroupCodeClass.Int32 | GroupCodeClass.Int64, [number, number]> = {
  [GroupCodeClass.Int16]: [-32768, 32767],
  [GroupCodeClass.Int32]: [-2147483648, 2147483647],
  // 64-bit values beyond 2^53 cannot be held exactly in a number
  [GroupCodeClass.Int64]: [Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER],
};

/** Fixed-point digits written for doubles, as printf's %f */
export const DOUBLE_PRECISION = 6;

export function parseDouble(raw: string): number | null {
  const text = raw.trim();
  if (!DOUBLE_PATTERN.test(text)) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

export function parseInteger(
  raw: string,
  valueClass: GroupCodeClass.Int16 | GroupCodeClass.Int32 | GroupCodeClass.Int64,
): number | null {
  const text = raw.trim();
  if (!INTEGER_PATTERN.test(text)) return null;
  const value = Number(text);
  const [min, max] = INTEGER_LIMITS[valueClass];
  return value >= min && value <= max ? value : null;
}

/** Booleans travel as 0 / 1 */
export function parseBool(raw: string): boolean | null {
  const text = raw.trim();
  if (text === '0') return false;
  if (text === '1') return true;
  return null;
}

/**
 * Hexadecimal handle text to its numeric value. Handles above
 * Number.MAX_SAFE_INTEGER (0x1fffffffffffff) are rejected.
 */
export function parseHandle(raw: string): number | null {
  const text = raw.trim();
  if (!HANDLE_PATTERN.test(text)) return null;
  const value = parseInt(text, 16);
  return Number.isSafeInteger(value) ? value : null;
}

export function formatDouble(value: number): string {
  return value.toFixed(DOUBLE_PRECISION);
}

export function formatInteger(value: number): string {
  return Math.trunc(value).toString(10);
}

export function formatBool(value: boolean): string {
  return value ? '1' : '0';
}

/** Handles are written in lower-case hex, as printf's %x */
export function formatHandle(value: number): string {
  return value.toString(16);
}

/**
 * Group-code line as written to the stream: right-aligned in three
 * columns ("  0", " 10", "100"), wider codes unpadded ("1001").
 */
export function formatGroupCode(groupCode: number): string {
  return groupCode.toString(10).padStart(3, ' ');
}
