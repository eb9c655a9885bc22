/**
 * Neo4j Processing Log Operations
 */

import type { Driver } from 'neo4j-driver';
import type { CreateProcessingLogInput } from '../../types';
import { generateId } from '../../utils';
import { runCommandWithRetry } from '../errors';
import { toNumber } from '../mapping';
import { CREATE_PROCESSING_LOGS } from '../queries';

/**
 * Append audit entries in one statement.
 * Entries are linked to the meeting when it exists.
 */
export async function appendProcessingLogs(
  driver: Driver,
  database: string | undefined,
  entries: CreateProcessingLogInput[],
  meetingId: string | null
): Promise<number> {
  if (entries.length === 0) return 0;

  const params = {
    meetingId,
    entries: entries.map((entry) => ({ id: generateId(), ...entry }))
  };

  return runCommandWithRetry(
    driver,
    database,
    'write',
    async (session) => {
      const result = await session.executeWrite((tx) => tx.run(CREATE_PROCESSING_LOGS, params));
      return toNumber(result.records[0]?.get('written'));
    },
    'appendProcessingLogs'
  );
}
