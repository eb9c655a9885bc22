/**
 * Project Extractor Agent
 *
 * Input: Transcript + optional summary
 * Output: Project or product name, or null when none is identified
 */

import type { Agent } from '../schemas';

export interface ProjectExtractorInput {
  transcript: string;
  summary: string | null;
}

/** Answers that mean "no project" */
const NO_PROJECT = new Set(['NONE', 'N/A', 'NOT FOUND', 'UNKNOWN', '']);

const SYSTEM_PROMPT = `# IDENTITY and PURPOSE

You identify the project or product a meeting is about.

# CONTEXT

1. Look for explicit project names (e.g., "Project Alpha", "Phoenix App", "Customer Portal").
2. Look for product names being discussed.
3. If multiple projects are mentioned, pick the main one being discussed.
4. Do NOT make up a project name.

# OUTPUT INSTRUCTIONS

- Return ONLY the project/product name, nothing else.
- If there is no clear project name, return "NONE".
- Examples of valid outputs: "Project Alpha", "E-Commerce Platform", "Mobile App v2", "NONE"`;

export function parseProjectName(text: string): string | null {
  const project = text.trim().replace(/^["']+|["']+$/g, '').trim();
  return NO_PROJECT.has(project.toUpperCase()) ? null : project;
}

export const extractProject: Agent<ProjectExtractorInput, string | null> = {
  systemPrompt: SYSTEM_PROMPT,
  formatInput: ({ transcript, summary }) => {
    const context = summary
      ? `Summary: ${summary}\n\nTranscript: ${transcript.slice(0, 1000)}`
      : transcript.slice(0, 1500);
    return `What project or product is being discussed in this meeting?\n\n${context}\n\nProject Name:`;
  },
  parseOutput: parseProjectName
};
