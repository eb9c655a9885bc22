/**
 * Pipeline Utilities
 */

import type { LLMClient, Message } from '@/providers/llm/types';
import { type RetryPolicy, withRetry } from '@/providers/retry';
import type { Agent } from './schemas';
import type { AuditEntry, AuditStatus, LLMSettings, RunState, StageName } from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// Agent Execution
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Call an agent under the run's retry policy.
 *
 * @param agent - The agent definition (prompt + formatInput + parseOutput)
 * @param input - Input to the agent
 * @param llmClient - LLM client for completion
 * @param retry - Retry policy shared by every external call of the run
 * @param params - Temperature and token limit for this operation
 */
export async function callAgent<I, O>(
  agent: Agent<I, O>,
  input: I,
  llmClient: LLMClient,
  retry: RetryPolicy,
  params: LLMSettings['summary'],
  operationName: string
): Promise<O> {
  const messages: Message[] = [
    { role: 'system', content: agent.systemPrompt },
    { role: 'user', content: agent.formatInput(input) }
  ];

  const text = await withRetry(
    retry,
    () =>
      llmClient.complete(messages, {
        maxTokens: params.maxTokens,
        temperature: params.temperature
      }),
    operationName
  );
  return agent.parseOutput(text);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run State Helpers
// ═══════════════════════════════════════════════════════════════════════════════

export function recordAudit(
  state: RunState,
  stage: StageName,
  status: AuditStatus,
  message: string | null = null
): AuditEntry {
  const entry: AuditEntry = { stage, status, message, timestamp: new Date().toISOString() };
  state.audit.push(entry);
  return entry;
}

/** Truncate text for log lines */
export function preview(text: string, maxLength: number = 40): string {
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (normalized.length <= maxLength) return normalized;
  return `${normalized.slice(0, maxLength - 3)}...`;
}

/**
 * Title used for the wiki page and the stored meeting.
 * Without an extracted title the meeting is named by its date.
 */
export function meetingTitle(state: RunState): string {
  return state.title ?? `Meeting ${state.meetingDate}`;
}
