export { buildTicketDescription, createTicketsStage } from './create-tickets';
export { extractTasksStage } from './extract-tasks';
export { persistStage } from './persist';
export { pageTitle, publishPageStage } from './publish-page';
export { summarizeStage } from './summarize';
