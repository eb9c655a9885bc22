export { type Neo4jConfig, Neo4jMeetingStore } from './client';
export { LABELS, RELS } from './constants';
export {
  classifyNeo4jError,
  isSchemaAlreadyExistsError,
  runCommand,
  runCommandWithRetry,
  STORE_RETRY,
  toStoreError
} from './errors';
export { recordToMeeting, recordToTask, recordToTranscription, toNumber } from './mapping';
