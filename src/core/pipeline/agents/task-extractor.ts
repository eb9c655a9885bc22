/**
 * Task Extractor Agent
 *
 * Input: Transcript + optional summary
 * Output: The raw completion. Parsing, repair and fallback belong to the
 * extraction cascade, which needs the unmodified text.
 */

import type { Agent } from '../schemas';

export interface TaskExtractorInput {
  transcript: string;
  summary: string | null;
}

const SYSTEM_PROMPT = `# IDENTITY and PURPOSE

You are a JSON extraction assistant. Your ONLY job is to extract action items from a meeting and return valid JSON.

# CONTEXT

Look for commitments and assignments. Typical phrasing: "will", "should", "needs to", "assigned to", "responsible for".

# OUTPUT INSTRUCTIONS

1. Output ONLY valid JSON: no explanations, no markdown, no text before or after.
2. Every response must start with { and end with }.
3. Use this exact format:
{"tasks": [{"title": "task description", "assignee": "person name", "due_date": "YYYY-MM-DD"}]}
4. If there is no clear assignee, use "Unassigned".
5. If no due date is mentioned, use null. Relative dates like "Friday" may be given as spoken.
6. If no tasks are found, return: {"tasks": []}`;

export const extractTasksAgent: Agent<TaskExtractorInput, string> = {
  systemPrompt: SYSTEM_PROMPT,
  formatInput: ({ transcript, summary }) => {
    const context = summary ? `Summary: ${summary}\n\nTranscript:\n${transcript}` : transcript;
    return `Extract all tasks/action items from this meeting and return ONLY JSON:\n\n${context}\n\nRespond with JSON only:`;
  },
  parseOutput: (text) => text
};
