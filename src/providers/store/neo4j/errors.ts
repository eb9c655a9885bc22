/**
 * Neo4j Error Handling & Session Management
 *
 * Turns driver failures into StoreErrors and runs each store command in its
 * own session. Transient failures are retried under the shared RetryPolicy.
 */

import type { Driver, Session } from 'neo4j-driver';
import { createRetryPolicy, type RetryPolicy, withRetry } from '../../retry';
import { StoreError, type StoreErrorType } from '../types';
import { RETRY } from './constants';

// ============================================================
// ERROR CLASSIFICATION
// ============================================================

const CONNECTION_HINTS = ['connection', 'unavailable', 'failed to connect'];
const CONSTRAINT_HINTS = ['constraint', 'unique'];
const TRANSIENT_HINTS = ['deadlock', 'timeout', 'transient'];
const SCHEMA_EXISTS_HINTS = [
  'equivalent',
  'already exists',
  'constraintalreadyexists',
  'indexalreadyexists'
];

function errorCode(error: Error): string {
  return 'code' in error && typeof error.code === 'string' ? error.code.toLowerCase() : '';
}

function mentions(text: string, hints: readonly string[]): boolean {
  return hints.some((hint) => text.includes(hint));
}

/**
 * Map a driver error to a StoreErrorType, by message first and then by
 * Neo4j status code (e.g. Neo.TransientError.Transaction.DeadlockDetected).
 */
export function classifyNeo4jError(error: unknown): StoreErrorType {
  if (!(error instanceof Error)) return 'QUERY_ERROR';

  const message = error.message.toLowerCase();
  const code = errorCode(error);

  if (mentions(message, CONNECTION_HINTS)) return 'CONNECTION_ERROR';
  if (mentions(message, CONSTRAINT_HINTS) || code.includes('constraint')) {
    return 'CONSTRAINT_VIOLATION';
  }
  if (mentions(message, TRANSIENT_HINTS) || mentions(code, ['transient', 'deadlock'])) {
    return 'TRANSIENT_ERROR';
  }
  return 'QUERY_ERROR';
}

/** Whether a schema statement failed only because the element exists */
export function isSchemaAlreadyExistsError(error: unknown): boolean {
  return error instanceof Error && mentions(error.message.toLowerCase(), SCHEMA_EXISTS_HINTS);
}

export function toStoreError(error: unknown, operationName: string): StoreError {
  if (error instanceof StoreError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new StoreError(
    `${operationName} failed: ${message}`,
    classifyNeo4jError(error),
    error instanceof Error ? error : undefined
  );
}

// ============================================================
// RETRY POLICY
// ============================================================

/** Store commands retry transient failures only, with short delays */
export const STORE_RETRY: RetryPolicy = createRetryPolicy({
  maxAttempts: RETRY.MAX_ATTEMPTS,
  baseDelayMs: RETRY.BASE_DELAY_MS,
  maxDelayMs: RETRY.MAX_DELAY_MS,
  retryable: (error) => error instanceof StoreError && error.retryable
});

// ============================================================
// SESSION LIFECYCLE MANAGEMENT
// ============================================================

export type CommandMode = 'read' | 'write';

/**
 * Open a session, run the operation, always close the session.
 * Failures are rethrown as classified StoreErrors.
 */
export async function runCommand<T>(
  driver: Driver,
  database: string | undefined,
  mode: CommandMode,
  operation: (session: Session) => Promise<T>,
  operationName: string
): Promise<T> {
  const session = driver.session({
    database,
    defaultAccessMode: mode === 'read' ? 'READ' : 'WRITE'
  });
  try {
    return await operation(session);
  } catch (error) {
    throw toStoreError(error, operationName);
  } finally {
    await session.close();
  }
}

/**
 * runCommand under a retry policy; each attempt gets a fresh session.
 */
export function runCommandWithRetry<T>(
  driver: Driver,
  database: string | undefined,
  mode: CommandMode,
  operation: (session: Session) => Promise<T>,
  operationName: string,
  policy: RetryPolicy = STORE_RETRY
): Promise<T> {
  return withRetry(
    policy,
    () => runCommand(driver, database, mode, operation, operationName),
    operationName
  );
}
