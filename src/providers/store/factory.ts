/**
 * Meeting Store Factory
 *
 * Creates meeting stores. Currently only supports Neo4j.
 */

import { type Neo4jConfig, Neo4jMeetingStore } from './neo4j';
import type { MeetingStore } from './types';

export function createMeetingStore(config: Neo4jConfig): MeetingStore {
  return new Neo4jMeetingStore(config);
}
