/**
 * Neo4j Meeting Operations
 *
 * Transcription and Meeting nodes. A meeting is always created after its
 * transcription, in the same persist stage.
 */

import neo4j, { type Driver } from 'neo4j-driver';
import type {
  CreateMeetingInput,
  CreateTranscriptionInput,
  Meeting,
  MeetingSummary,
  Transcription
} from '../../types';
import { StoreError } from '../../types';
import { generateId, now } from '../../utils';
import { runCommand, runCommandWithRetry } from '../errors';
import { recordToMeeting, recordToTranscription, toNumber } from '../mapping';
import { CREATE_MEETING, CREATE_TRANSCRIPTION, LIST_MEETINGS } from '../queries';

// ============================================================
// WRITES
// ============================================================

export async function createTranscription(
  driver: Driver,
  database: string | undefined,
  input: CreateTranscriptionInput
): Promise<Transcription> {
  const params = { id: generateId(), ...input, created_at: now() };

  return runCommandWithRetry(
    driver,
    database,
    'write',
    async (session) => {
      const result = await session.executeWrite((tx) => tx.run(CREATE_TRANSCRIPTION, params));
      const record = result.records[0];
      if (!record) {
        throw new StoreError('Failed to create Transcription', 'QUERY_ERROR');
      }
      return recordToTranscription(record.get('t'));
    },
    'createTranscription'
  );
}

export async function createMeeting(
  driver: Driver,
  database: string | undefined,
  input: CreateMeetingInput
): Promise<Meeting> {
  const params = { id: generateId(), ...input, created_at: now() };

  return runCommandWithRetry(
    driver,
    database,
    'write',
    async (session) => {
      const result = await session.executeWrite((tx) => tx.run(CREATE_MEETING, params));
      const record = result.records[0];
      if (!record) {
        throw new StoreError(
          `Failed to create Meeting: transcription ${input.transcriptionId} not found`,
          'QUERY_ERROR'
        );
      }
      return recordToMeeting(record.get('m'));
    },
    'createMeeting'
  );
}

// ============================================================
// READS
// ============================================================

/**
 * Most recent meetings first, with their task counts.
 */
export async function listMeetings(
  driver: Driver,
  database: string | undefined,
  limit: number
): Promise<MeetingSummary[]> {
  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.run(LIST_MEETINGS, { limit: neo4j.int(limit) });
      return result.records.map((record) => ({
        ...recordToMeeting(record.get('m')),
        taskCount: toNumber(record.get('taskCount'))
      }));
    },
    'listMeetings'
  );
}
