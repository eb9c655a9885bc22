/**
 * Neo4j Meeting Store
 *
 * MeetingStore over a single driver. Connection management lives here; every
 * read and write is delegated to the operation modules.
 */

import neo4j, { type Driver } from 'neo4j-driver';
import type {
  CreateMeetingInput,
  CreateProcessingLogInput,
  CreateTaskInput,
  CreateTranscriptionInput,
  Meeting,
  MeetingStore,
  MeetingSummary,
  Task,
  TaskFilter,
  Transcription
} from '../types';
import { StoreError } from '../types';
import { runCommandWithRetry } from './errors';
import {
  appendProcessingLogs,
  createMeeting,
  createTask,
  createTranscription,
  listMeetings,
  listTasks
} from './operations';
import { initializeSchema } from './schema';

// ============================================================
// CONFIGURATION
// ============================================================

export interface Neo4jConfig {
  uri: string;
  user: string;
  password: string;
  /** Server default database when omitted */
  database?: string;
}

// ============================================================
// CLIENT IMPLEMENTATION
// ============================================================

export class Neo4jMeetingStore implements MeetingStore {
  private _driver: Driver | null = null;
  private readonly config: Neo4jConfig;

  constructor(config: Neo4jConfig) {
    this.config = config;
  }

  /** Throws until connect() has succeeded */
  get driver(): Driver {
    if (!this._driver) {
      throw new StoreError('Not connected to Neo4j', 'CONNECTION_ERROR');
    }
    return this._driver;
  }

  get database(): string | undefined {
    return this.config.database;
  }

  // ----------------------------------------------------------
  // Connection
  // ----------------------------------------------------------

  async connect(): Promise<void> {
    this._driver = neo4j.driver(
      this.config.uri,
      neo4j.auth.basic(this.config.user, this.config.password)
    );

    // Startup fails here rather than on the first run's persist stage
    try {
      await this.driver.verifyConnectivity();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new StoreError(
        `Failed to connect to Neo4j at ${this.config.uri}: ${reason}`,
        'CONNECTION_ERROR',
        error instanceof Error ? error : undefined
      );
    }
  }

  async disconnect(): Promise<void> {
    if (this._driver) {
      await this._driver.close();
      this._driver = null;
    }
  }

  /** False when disconnected or the server does not answer */
  async healthCheck(): Promise<boolean> {
    if (!this._driver) return false;
    return this._driver.verifyConnectivity().then(
      () => true,
      () => false
    );
  }

  async initializeSchema(): Promise<void> {
    await runCommandWithRetry(
      this.driver,
      this.config.database,
      'write',
      initializeSchema,
      'initializeSchema'
    );
  }

  // ----------------------------------------------------------
  // Writes
  // ----------------------------------------------------------

  async createTranscription(input: CreateTranscriptionInput): Promise<Transcription> {
    return createTranscription(this.driver, this.config.database, input);
  }

  async createMeeting(input: CreateMeetingInput): Promise<Meeting> {
    return createMeeting(this.driver, this.config.database, input);
  }

  async createTask(input: CreateTaskInput): Promise<Task> {
    return createTask(this.driver, this.config.database, input);
  }

  async appendProcessingLogs(
    entries: CreateProcessingLogInput[],
    meetingId: string | null
  ): Promise<number> {
    return appendProcessingLogs(this.driver, this.config.database, entries, meetingId);
  }

  // ----------------------------------------------------------
  // Reads
  // ----------------------------------------------------------

  async listMeetings(limit: number): Promise<MeetingSummary[]> {
    return listMeetings(this.driver, this.config.database, limit);
  }

  async listTasks(filter?: TaskFilter): Promise<Task[]> {
    return listTasks(this.driver, this.config.database, filter);
  }
}
