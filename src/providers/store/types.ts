/**
 * Meeting Store Interface
 *
 * Append-only record of processed meetings. Defines the contract the
 * persist stage writes through and the HTTP layer reads from.
 */

// ============================================================
// ERROR TYPES
// ============================================================

export type StoreErrorType =
  | 'CONNECTION_ERROR' // Failed to connect to database
  | 'CONSTRAINT_VIOLATION' // Unique constraint violated
  | 'QUERY_ERROR' // Invalid query or execution error
  | 'TRANSIENT_ERROR'; // Temporary failure (retry possible)

/**
 * Standardized error class for store operations.
 */
export class StoreError extends Error {
  public override readonly cause?: Error;

  constructor(
    message: string,
    public readonly type: StoreErrorType,
    cause?: Error
  ) {
    super(message);
    this.name = 'StoreError';
    this.cause = cause;
  }

  /**
   * Whether this error is retryable (transient failures).
   */
  get retryable(): boolean {
    return this.type === 'TRANSIENT_ERROR';
  }
}

// ============================================================
// RECORD TYPES
// ============================================================

export interface Transcription {
  id: string;
  /** Summary, or the leading excerpt of the transcript */
  content: string;
  meetingDate: string;
  created_at: string;
}

export interface Meeting {
  id: string;
  title: string;
  meetingDate: string;
  projectName: string | null;
  fileName: string | null;
  pageId: string | null;
  pageUrl: string | null;
  created_at: string;
}

export interface Task {
  id: string;
  description: string;
  assignee: string;
  deadline: string;
  ticketKey: string | null;
  extractionMethod: string;
  created_at: string;
}

export interface MeetingSummary extends Meeting {
  taskCount: number;
}

export interface ProcessingLog {
  id: string;
  stage: string;
  status: string;
  message: string | null;
  timestamp: string;
}

// ============================================================
// INPUT TYPES
// ============================================================

export type CreateTranscriptionInput = Omit<Transcription, 'id' | 'created_at'>;

export interface CreateMeetingInput extends Omit<Meeting, 'id' | 'created_at'> {
  transcriptionId: string;
}

export interface CreateTaskInput extends Omit<Task, 'id' | 'created_at'> {
  meetingId: string;
}

export type CreateProcessingLogInput = Omit<ProcessingLog, 'id'>;

export interface TaskFilter {
  /** Exact roster name */
  assignee?: string;
  limit?: number;
}

// ============================================================
// STORE INTERFACE
// ============================================================

export interface MeetingStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  healthCheck(): Promise<boolean>;
  initializeSchema(): Promise<void>;

  createTranscription(input: CreateTranscriptionInput): Promise<Transcription>;
  /** Creates the meeting and links it to its transcription */
  createMeeting(input: CreateMeetingInput): Promise<Meeting>;
  /** Creates the task, links it to its meeting and MERGEs the assignee Member */
  createTask(input: CreateTaskInput): Promise<Task>;
  /** Appends audit entries, linked to the meeting when known; returns the count written */
  appendProcessingLogs(entries: CreateProcessingLogInput[], meetingId: string | null): Promise<number>;

  listMeetings(limit: number): Promise<MeetingSummary[]>;
  listTasks(filter?: TaskFilter): Promise<Task[]>;
}
