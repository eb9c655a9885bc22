/**
 * Neo4j Record Mapping
 *
 * Translators that convert Neo4j nodes to the store's record types.
 * Centralizes all type coercion and null handling.
 */

import type { Meeting, Task, Transcription } from '../types';

// ============================================================
// NODE TYPE DEFINITION
// ============================================================

/**
 * Shape of a Neo4j node as returned by the driver.
 */
export interface Neo4jNode {
  properties: Record<string, unknown>;
}

// ============================================================
// PROPERTY READERS
// ============================================================

function text(props: Record<string, unknown>, key: string): string {
  const value = props[key];
  return typeof value === 'string' ? value : '';
}

function optionalText(props: Record<string, unknown>, key: string): string | null {
  const value = props[key];
  return typeof value === 'string' ? value : null;
}

// ============================================================
// RECORD TRANSLATORS
// ============================================================

export function recordToTranscription(node: Neo4jNode): Transcription {
  const props = node.properties;
  return {
    id: text(props, 'id'),
    content: text(props, 'content'),
    meetingDate: text(props, 'meetingDate'),
    created_at: text(props, 'created_at')
  };
}

export function recordToMeeting(node: Neo4jNode): Meeting {
  const props = node.properties;
  return {
    id: text(props, 'id'),
    title: text(props, 'title'),
    meetingDate: text(props, 'meetingDate'),
    projectName: optionalText(props, 'projectName'),
    fileName: optionalText(props, 'fileName'),
    pageId: optionalText(props, 'pageId'),
    pageUrl: optionalText(props, 'pageUrl'),
    created_at: text(props, 'created_at')
  };
}

export function recordToTask(node: Neo4jNode): Task {
  const props = node.properties;
  return {
    id: text(props, 'id'),
    description: text(props, 'description'),
    assignee: text(props, 'assignee'),
    deadline: text(props, 'deadline'),
    ticketKey: optionalText(props, 'ticketKey'),
    extractionMethod: text(props, 'extractionMethod'),
    created_at: text(props, 'created_at')
  };
}

/**
 * Neo4j returns integers as its own Integer type; plain numbers pass through.
 */
export function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'object' && value !== null && 'toNumber' in value) {
    const convert = value.toNumber;
    if (typeof convert === 'function') {
      const result: unknown = convert.call(value);
      if (typeof result === 'number') return result;
    }
  }
  return 0;
}
