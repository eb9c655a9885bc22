export { createMeetingStore } from './factory';
export * from './neo4j';
export * from './types';
