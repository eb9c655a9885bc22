/**
 * Neo4j Query Repository
 *
 * Centralized Cypher queries for the meeting graph.
 */

import { LABELS, RELS } from './constants';

// ============================================================
// SCHEMA QUERIES
// ============================================================

/**
 * Unique id per label. Member is MERGEd by name, so name is unique too.
 */
export const CONSTRAINTS = {
  TRANSCRIPTION_ID: `CREATE CONSTRAINT transcription_id_unique IF NOT EXISTS FOR (t:${LABELS.TRANSCRIPTION}) REQUIRE t.id IS UNIQUE`,
  MEETING_ID: `CREATE CONSTRAINT meeting_id_unique IF NOT EXISTS FOR (m:${LABELS.MEETING}) REQUIRE m.id IS UNIQUE`,
  TASK_ID: `CREATE CONSTRAINT task_id_unique IF NOT EXISTS FOR (t:${LABELS.TASK}) REQUIRE t.id IS UNIQUE`,
  MEMBER_NAME: `CREATE CONSTRAINT member_name_unique IF NOT EXISTS FOR (p:${LABELS.MEMBER}) REQUIRE p.name IS UNIQUE`,
  PROCESSING_LOG_ID: `CREATE CONSTRAINT processing_log_id_unique IF NOT EXISTS FOR (l:${LABELS.PROCESSING_LOG}) REQUIRE l.id IS UNIQUE`
} as const;

/**
 * Range indexes for the list endpoints (newest meetings first).
 */
export const RANGE_INDEXES = {
  MEETING_CREATED_AT: `CREATE INDEX meeting_created_at IF NOT EXISTS FOR (m:${LABELS.MEETING}) ON (m.created_at)`,
  TASK_ASSIGNEE: `CREATE INDEX task_assignee IF NOT EXISTS FOR (t:${LABELS.TASK}) ON (t.assignee)`
} as const;

// ============================================================
// WRITE QUERIES
// ============================================================

export const CREATE_TRANSCRIPTION = `
CREATE (t:${LABELS.TRANSCRIPTION} {
  id: $id,
  content: $content,
  meetingDate: $meetingDate,
  created_at: $created_at
})
RETURN t`;

/**
 * The transcription is created first in the same run, so a plain MATCH
 * is enough; a missing transcription yields no row.
 */
export const CREATE_MEETING = `
MATCH (t:${LABELS.TRANSCRIPTION} {id: $transcriptionId})
CREATE (m:${LABELS.MEETING} {
  id: $id,
  title: $title,
  meetingDate: $meetingDate,
  projectName: $projectName,
  fileName: $fileName,
  pageId: $pageId,
  pageUrl: $pageUrl,
  created_at: $created_at
})
CREATE (m)-[:${RELS.HAS_TRANSCRIPTION}]->(t)
RETURN m`;

export const CREATE_TASK = `
MATCH (m:${LABELS.MEETING} {id: $meetingId})
CREATE (t:${LABELS.TASK} {
  id: $id,
  description: $description,
  assignee: $assignee,
  deadline: $deadline,
  ticketKey: $ticketKey,
  extractionMethod: $extractionMethod,
  created_at: $created_at
})
CREATE (m)-[:${RELS.HAS_TASK}]->(t)
MERGE (p:${LABELS.MEMBER} {name: $assignee})
CREATE (t)-[:${RELS.ASSIGNED_TO}]->(p)
RETURN t`;

/**
 * Batch insert of audit entries. The OPTIONAL MATCH keeps entries
 * whose run never produced a meeting.
 */
export const CREATE_PROCESSING_LOGS = `
OPTIONAL MATCH (m:${LABELS.MEETING} {id: $meetingId})
UNWIND $entries AS entry
CREATE (l:${LABELS.PROCESSING_LOG} {
  id: entry.id,
  stage: entry.stage,
  status: entry.status,
  message: entry.message,
  timestamp: entry.timestamp
})
FOREACH (_ IN CASE WHEN m IS NULL THEN [] ELSE [1] END |
  CREATE (l)-[:${RELS.LOGGED_FOR}]->(m)
)
RETURN count(l) AS written`;

// ============================================================
// READ QUERIES
// ============================================================

export const LIST_MEETINGS = `
MATCH (m:${LABELS.MEETING})
OPTIONAL MATCH (m)-[:${RELS.HAS_TASK}]->(t:${LABELS.TASK})
WITH m, count(t) AS taskCount
RETURN m, taskCount
ORDER BY m.created_at DESC
LIMIT $limit`;

export const LIST_TASKS = `
MATCH (t:${LABELS.TASK})
WHERE $assignee IS NULL OR t.assignee = $assignee
RETURN t
ORDER BY t.created_at DESC
LIMIT $limit`;
