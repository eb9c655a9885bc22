/**
 * Title Extractor Agent
 *
 * Input: Meeting transcript
 * Output: Short meeting title (fallback "Team Meeting")
 */

import type { Agent } from '../schemas';

export interface TitleExtractorInput {
  transcript: string;
}

export const DEFAULT_TITLE = 'Team Meeting';
export const MAX_TITLE_LENGTH = 80;

/** Transcript characters sent for title extraction */
const TITLE_CONTEXT_LENGTH = 2000;

const SYSTEM_PROMPT = `# IDENTITY and PURPOSE

You name meetings. Given a transcript, you produce a concise, descriptive title.

# CONTEXT

1. Identify the main project, topic, or theme of the meeting.
2. If a project name is mentioned, include it (e.g., "Project Alpha Sprint Planning").
3. If no specific project is mentioned, use the main topic discussed.

# OUTPUT INSTRUCTIONS

- Keep the title under 60 characters.
- Format: "[Project/Topic] - [Meeting Type]" or just "[Main Topic]".
- Examples: "Project Phoenix - Weekly Sync", "API Integration Review", "Q4 Budget Planning".
- Return ONLY the title, no explanation.`;

/**
 * Strip quotes and cap the length; an empty answer falls back to the default.
 */
export function cleanTitle(text: string): string {
  const title = text.trim().replace(/^["']+|["']+$/g, '').trim();
  if (!title) return DEFAULT_TITLE;
  if (title.length > MAX_TITLE_LENGTH) return `${title.slice(0, MAX_TITLE_LENGTH - 3)}...`;
  return title;
}

export const extractTitle: Agent<TitleExtractorInput, string> = {
  systemPrompt: SYSTEM_PROMPT,
  formatInput: ({ transcript }) =>
    `Extract a meeting title from this transcript:\n\n${transcript.slice(0, TITLE_CONTEXT_LENGTH)}\n\nMeeting Title:`,
  parseOutput: cleanTitle
};
