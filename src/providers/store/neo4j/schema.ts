/**
 * Neo4j Schema Management
 *
 * Constraints and indexes for the meeting graph. Every statement uses
 * IF NOT EXISTS, so initialization can run on every startup.
 */

import type { Session } from 'neo4j-driver';
import { isSchemaAlreadyExistsError } from './errors';
import { CONSTRAINTS, RANGE_INDEXES } from './queries';

export async function initializeSchema(session: Session): Promise<void> {
  // Constraints first (they create implicit indexes)
  for (const cypher of Object.values(CONSTRAINTS)) {
    await runSchemaOperation(session, cypher);
  }

  for (const cypher of Object.values(RANGE_INDEXES)) {
    await runSchemaOperation(session, cypher);
  }
}

/**
 * Run a single schema statement. Another instance may have created the
 * same element concurrently; "already exists" is accepted.
 */
async function runSchemaOperation(session: Session, cypher: string): Promise<void> {
  try {
    await session.run(cypher);
  } catch (error) {
    if (isSchemaAlreadyExistsError(error)) {
      return;
    }
    throw error;
  }
}
