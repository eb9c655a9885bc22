/**
 * Test Fixtures
 *
 * Shared test data: configs, roster and meeting text.
 * Keep these minimal and focused on what each test category needs.
 */

import { type Config, type ConfigInput, configSchema } from '@/config/schema';

// ═══════════════════════════════════════════════════════════════════════════════
// Dates
// ═══════════════════════════════════════════════════════════════════════════════

/** Monday 19 October 2026, local midnight */
export const REFERENCE_DATE = new Date(2026, 9, 19);

// ═══════════════════════════════════════════════════════════════════════════════
// Roster Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

export const ROSTER_MEMBERS = ['Alice Johnson', 'Bob Smith', 'Carol Diaz'];

export const ROSTER_ALIASES = {
  'Alice Johnson': ['AJ'],
  'Bob Smith': ['Bobby']
};

// ═══════════════════════════════════════════════════════════════════════════════
// Config Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

/** Valid minimal config: only the required sections */
export const VALID_MINIMAL_CONFIG = {
  store: {
    uri: 'bolt://localhost:7687',
    user: 'neo4j',
    password: 'test-password'
  },
  roster: {
    members: ROSTER_MEMBERS
  }
} satisfies ConfigInput;

/** Every section filled in */
export const VALID_FULL_CONFIG = {
  ...VALID_MINIMAL_CONFIG,
  llm: {
    provider: 'openai' as const,
    apiKey: 'test-key',
    defaults: { model: 'gpt-4o-mini', temperature: 0.2 }
  },
  transcription: {
    provider: 'openai' as const,
    apiKey: 'test-key'
  },
  tracker: {
    baseUrl: 'https://tracker.test',
    email: 'bot@example.com',
    apiToken: 'test-token',
    projectKey: 'OPS'
  },
  wiki: {
    baseUrl: 'https://wiki.test/wiki',
    email: 'bot@example.com',
    apiToken: 'test-token',
    spaceKey: 'TEAM'
  },
  roster: {
    members: ROSTER_MEMBERS,
    aliases: ROSTER_ALIASES
  }
} satisfies ConfigInput;

/**
 * Parse a config input the way the loader does, applying defaults.
 */
export function buildConfig(input: ConfigInput = VALID_MINIMAL_CONFIG): Config {
  return configSchema.parse(input);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Meeting Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

export const STANDUP_TRANSCRIPT = [
  'Alice: Morning everyone, quick sync on the release.',
  'Bob: The staging deploy is green.',
  'Alice will prepare the release notes by Friday.',
  'Bob will fix the login timeout.'
].join('\n');

/** Structured extraction answer with the usual model quirks: fences and a trailing comma */
export const FENCED_TASKS_RESPONSE = [
  '```json',
  '{"tasks": [',
  '  {"description": "Prepare the release notes", "assignee": "Alice", "due_date": "Friday"},',
  '  {"description": "Fix the login timeout", "assignee": "Bobby", "due_date": null},',
  ']}',
  '```'
].join('\n');
