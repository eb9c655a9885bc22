export { cleanTitle, DEFAULT_TITLE, extractTitle, MAX_TITLE_LENGTH } from './title-extractor';
export { extractProject, parseProjectName } from './project-extractor';
export { summarize } from './summarizer';
export { extractTasksAgent } from './task-extractor';
