/**
 * Session identifiers
 *
 * Format: session_YYYYMMDD_HHMMSS_xxxxxxxx
 * The timestamp makes ids sort by creation time; the suffix is the first
 * 32 bits of a v4 UUID so ids minted in the same second do not collide.
 *
 * @module services/session/session-id
 */

import { v4 as uuidv4 } from 'uuid';

/** Ids accepted from callers: one safe path segment */
const SESSION_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]{0,127}$/;

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Format a local timestamp as YYYYMMDD_HHMMSS
 */
export function formatSessionTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * Generate a unique, sortable session id
 *
 * @param now - Clock reading (injectable for tests)
 */
export function generateSessionId(now: Date = new Date()): string {
  const suffix = uuidv4().replace(/-/g, '').slice(0, 8);
  return `session_${formatSessionTimestamp(now)}_${suffix}`;
}

/**
 * Check that a caller-supplied session id is usable. Session ids become
 * directory names, so anything that is not a single safe path segment is
 * rejected before touching the filesystem.
 */
export function isValidSessionId(value: string): boolean {
  return SESSION_ID_PATTERN.test(value);
}
