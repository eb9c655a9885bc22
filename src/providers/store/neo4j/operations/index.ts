export { appendProcessingLogs } from './logs';
export { createMeeting, createTranscription, listMeetings } from './meetings';
export { createTask, listTasks } from './tasks';
