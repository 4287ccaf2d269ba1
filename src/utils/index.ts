/**
 * Utility Functions
 *
 * Shared helper functions used throughout the application.
 *
 * @module utils
 */

import { randomUUID } from 'crypto';

/**
 * Generates a new UUID v4.
 *
 * @returns A new UUID string
 */
export function generateId(): string {
  return randomUUID();
}

/** Binary multipliers for size suffixes, as stress-ng reads them. */
const SIZE_UNITS: Record<string, number> = {
  B: 1,
  K: 1024,
  M: 1024 ** 2,
  G: 1024 ** 3,
  T: 1024 ** 4,
};

/**
 * Parses a byte quantity such as "512M", "2g", "1024k", "64MiB" or "4096".
 *
 * Units are binary multiples. A bare number is a byte count.
 *
 * @param value - Size string
 * @returns Size in bytes, or null if the string is not a byte quantity
 */
export function parseByteSize(value: string): number | null {
  const match = /^(\d+)\s*([bkmgt])?(?:i?b)?$/i.exec(value.trim());
  if (!match) {
    return null;
  }
  const amount = parseInt(match[1], 10);
  const unit = (match[2] ?? 'B').toUpperCase();
  const bytes = amount * SIZE_UNITS[unit];
  return Number.isSafeInteger(bytes) ? bytes : null;
}

/**
 * Converts megabytes to bytes.
 *
 * @param mb - Size in megabytes
 * @returns Size in bytes
 */
export function mbToBytes(mb: number): number {
  return mb * 1024 * 1024;
}

/**
 * Rounds to two decimal places.
 */
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Clamps a value to a range.
 *
 * @param value - Value to clamp
 * @param min - Minimum allowed value
 * @param max - Maximum allowed value
 * @returns Clamped value
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Formats a byte count with the largest binary suffix that divides it
 * exactly ("64M", "1536K"), or as a bare byte count. stress-ng reads the
 * scale from the last character only, so this is the form passed to it.
 */
export function formatByteSize(bytes: number): string {
  for (const unit of ['T', 'G', 'M', 'K']) {
    const multiplier = SIZE_UNITS[unit];
    if (bytes >= multiplier && bytes % multiplier === 0) {
      return `${bytes / multiplier}${unit}`;
    }
  }
  return String(bytes);
}
