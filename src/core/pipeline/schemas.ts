/**
 * Pipeline Schemas
 *
 * Zod schemas for pipeline input and the Agent contract for LLM prompts.
 */

import { z } from 'zod';

/**
 * Agent definition for an LLM prompt.
 *
 * @template I - Input type for formatInput
 * @template O - Output type produced by parseOutput
 */
export interface Agent<I, O> {
  /** System prompt with IDENTITY, CONTEXT and OUTPUT INSTRUCTIONS sections */
  systemPrompt: string;
  /** Transforms structured input into the user message content */
  formatInput: (input: I) => string;
  /** Turns the raw completion into the agent's output */
  parseOutput: (text: string) => O;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Input Schemas
// ═══════════════════════════════════════════════════════════════════════════════

const datePattern = /^\d{4}-\d{2}-\d{2}$/;

export const MeetingInputSchema = z
  .object({
    transcript: z.string().optional(),
    audioPath: z.string().min(1).optional(),
    meetingDate: z.string().regex(datePattern, 'meetingDate must be YYYY-MM-DD').optional(),
    filename: z.string().min(1).optional()
  })
  .refine((data) => Boolean(data.transcript?.trim()) || Boolean(data.audioPath), {
    message: 'transcript or audioPath is required'
  });
export type MeetingInput = z.infer<typeof MeetingInputSchema>;
