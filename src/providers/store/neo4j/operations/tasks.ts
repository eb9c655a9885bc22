/**
 * Neo4j Task Operations
 */

import neo4j, { type Driver } from 'neo4j-driver';
import type { CreateTaskInput, Task, TaskFilter } from '../../types';
import { StoreError } from '../../types';
import { generateId, now } from '../../utils';
import { runCommand, runCommandWithRetry } from '../errors';
import { recordToTask } from '../mapping';
import { CREATE_TASK, LIST_TASKS } from '../queries';

const DEFAULT_TASK_LIMIT = 100;

/**
 * Create a Task under its meeting and link it to the assignee's Member node.
 */
export async function createTask(
  driver: Driver,
  database: string | undefined,
  input: CreateTaskInput
): Promise<Task> {
  const params = { id: generateId(), ...input, created_at: now() };

  return runCommandWithRetry(
    driver,
    database,
    'write',
    async (session) => {
      const result = await session.executeWrite((tx) => tx.run(CREATE_TASK, params));
      const record = result.records[0];
      if (!record) {
        throw new StoreError(
          `Failed to create Task: meeting ${input.meetingId} not found`,
          'QUERY_ERROR'
        );
      }
      return recordToTask(record.get('t'));
    },
    'createTask'
  );
}

export async function listTasks(
  driver: Driver,
  database: string | undefined,
  filter: TaskFilter = {}
): Promise<Task[]> {
  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.run(LIST_TASKS, {
        assignee: filter.assignee ?? null,
        limit: neo4j.int(filter.limit ?? DEFAULT_TASK_LIMIT)
      });
      return result.records.map((record) => recordToTask(record.get('t')));
    },
    'listTasks'
  );
}
