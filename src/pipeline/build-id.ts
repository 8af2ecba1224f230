/**
 * Build ID generation
 *
 * @module pipeline/build-id
 */

import { randomBytes } from 'node:crypto';

const SUFFIX_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';

/**
 * Format a date as YYYYMMDD-HHMMSS string (local time).
 */
function formatTimestamp(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  return `${year}${month}${day}-${hours}${minutes}${seconds}`;
}

/**
 * Generate a build ID: YYYYMMDD-HHMMSS-xxxx. The random suffix keeps two
 * builds started in the same second apart.
 *
 * @example
 * generateBuildId(new Date(2026, 2, 1, 10, 15, 0)); // "20260301-101500-k3q9"
 */
export function generateBuildId(date: Date = new Date()): string {
  const suffix = Array.from(randomBytes(4))
    .map((byte) => SUFFIX_ALPHABET[byte % SUFFIX_ALPHABET.length])
    .join('');
  return `${formatTimestamp(date)}-${suffix}`;
}
