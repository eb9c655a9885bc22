/**
 * Store Utilities
 */

import { randomUUID } from 'node:crypto';

/**
 * Generate a random UUID (v4).
 */
export function generateId(): string {
  return randomUUID();
}

/**
 * Get current timestamp in ISO 8601 format.
 */
export function now(): string {
  return new Date().toISOString();
}
