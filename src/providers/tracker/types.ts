/**
 * Ticket tracker contract used by the create-tickets stage.
 */

export interface IssueInput {
  summary: string;
  /** Plain-text description; each line becomes a paragraph */
  description: string;
  /** Roster display name, or null to leave unassigned */
  assignee: string | null;
  /** yyyy-MM-dd; anything else is not sent */
  dueDate: string | null;
}

export interface CreatedIssue {
  id: string;
  key: string;
  url: string;
  /** Issue type actually used after fallback */
  issueType: string;
  /** False when the assignee had no matching account */
  assigned: boolean;
}

export interface DuplicateMatch {
  key: string;
  summary: string;
  similarity: number;
  url: string;
}

export interface TicketTracker {
  /** True when credentials and project are all present */
  readonly isConfigured: boolean;

  createIssue(input: IssueInput): Promise<CreatedIssue>;

  /**
   * Find an open issue whose summary is close enough to `summary`
   * and whose assignee matches (or both are unassigned).
   */
  findDuplicate(summary: string, assignee: string | null): Promise<DuplicateMatch | null>;

  testConnection(): Promise<boolean>;

  issueUrl(key: string): string;
}
