/**
 * Summarizer Agent
 *
 * Input: Meeting transcript
 * Output: One or two sentence summary
 */

import type { Agent } from '../schemas';

export interface SummarizerInput {
  transcript: string;
}

const SYSTEM_PROMPT = `# IDENTITY and PURPOSE

You summarize team meetings for the people who attended them.

# OUTPUT INSTRUCTIONS

- Summarize the meeting in 1-2 sentences.
- Be direct and concise.
- Mention who committed to what when it is stated.
- Return ONLY the summary text, no heading or preamble.`;

export const summarize: Agent<SummarizerInput, string> = {
  systemPrompt: SYSTEM_PROMPT,
  formatInput: ({ transcript }) => `Transcript:\n${transcript}\n\nSummary:`,
  parseOutput: (text) => text.trim()
};
