export * from './jira';
export type { CreatedIssue, DuplicateMatch, IssueInput, TicketTracker } from './types';
