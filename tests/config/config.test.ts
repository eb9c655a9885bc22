/**
 * Configuration System Tests
 *
 * Tests for the config loader and schema validation.
 * Focuses on {env:VAR} resolution, section defaults and provider-specific validation.
 */

import { readFileSync } from 'node:fs';
import { describe, expect, test } from 'vitest';
import { getLLMDisplayName, parseConfig, resolveEnvVars } from '@/config/config';
import { type ConfigInput, configSchema } from '@/config/schema';
import { JiraClient } from '@/providers/tracker';
import { ConfluenceClient } from '@/providers/wiki';
import { buildConfig, VALID_FULL_CONFIG, VALID_MINIMAL_CONFIG } from '../helpers/fixtures';

function issueMessages(input: ConfigInput): string[] {
  const result = configSchema.safeParse(input);
  return result.success ? [] : result.error.issues.map((i) => i.message);
}

describe('configSchema', () => {
  describe('valid configurations', () => {
    test('accepts the minimal config and fills section defaults', () => {
      const config = buildConfig(VALID_MINIMAL_CONFIG);

      expect(config.server.port).toBe(6366);
      expect(config.recordings).toEqual({
        directory: 'recordings',
        pollIntervalSeconds: 30,
        autoPoll: true
      });
      expect(config.pipeline).toEqual({
        defaultDeadlineDays: 7,
        maxFallbackTasks: 10,
        minDescriptionLength: 4,
        matchThreshold: 0.6,
        transcriptExcerptLength: 5000
      });
      expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 2000, maxDelayMs: 10000 });
      expect(config.llm).toBeNull();
      expect(config.transcription).toBeNull();
      expect(config.tracker).toBeNull();
      expect(config.wiki).toBeNull();
      expect(config.roster.aliases).toEqual({});
    });

    test('applies tracker defaults', () => {
      const config = buildConfig(VALID_FULL_CONFIG);

      expect(config.tracker).toMatchObject({
        issueType: 'Task',
        labels: ['meeting-action-item'],
        duplicateThreshold: 0.85
      });
      expect(config.transcription?.model).toBe('whisper-1');
    });

    test('merges per-operation sampling with the shared defaults', () => {
      const config = buildConfig({
        ...VALID_FULL_CONFIG,
        llm: { ...VALID_FULL_CONFIG.llm, summary: { temperature: 0.7, maxTokens: 800 } }
      });

      expect(config.llm?.summary).toEqual({
        model: 'gpt-4o-mini',
        temperature: 0.7,
        maxTokens: 800
      });
      expect(config.llm?.extraction).toEqual({ model: 'gpt-4o-mini', temperature: 0.2 });
    });

    test('accepts an openai-compatible provider with a base URL and name', () => {
      const messages = issueMessages({
        ...VALID_MINIMAL_CONFIG,
        llm: {
          provider: 'openai-compatible',
          providerName: 'LM Studio',
          baseUrl: 'http://localhost:1234/v1',
          defaults: { model: 'local-model' }
        }
      });
      expect(messages).toEqual([]);
    });
  });

  describe('provider validation', () => {
    test('cloud providers need an apiKey and no baseUrl', () => {
      expect(
        issueMessages({
          ...VALID_MINIMAL_CONFIG,
          llm: { provider: 'anthropic', baseUrl: 'https://x.test', defaults: { model: 'm' } }
        })
      ).toEqual([
        "apiKey required for provider 'anthropic'",
        "baseUrl not allowed for provider 'anthropic'"
      ]);
    });

    test('openai-compatible needs a baseUrl', () => {
      expect(
        issueMessages({
          ...VALID_MINIMAL_CONFIG,
          llm: { provider: 'openai-compatible', defaults: { model: 'm' } }
        })
      ).toEqual(["baseUrl required for provider 'openai-compatible'"]);
    });

    test('providerName is only for openai-compatible', () => {
      expect(
        issueMessages({
          ...VALID_MINIMAL_CONFIG,
          llm: {
            provider: 'ollama',
            providerName: 'Local',
            defaults: { model: 'llama3' }
          }
        })
      ).toEqual(["providerName only allowed for provider 'openai-compatible'"]);
    });

    test('openai transcription needs an apiKey', () => {
      expect(
        issueMessages({ ...VALID_MINIMAL_CONFIG, transcription: { provider: 'openai' } })
      ).toEqual(["apiKey required for provider 'openai'"]);
    });
  });

  describe('roster validation', () => {
    test('rejects an empty roster', () => {
      const result = configSchema.safeParse({
        ...VALID_MINIMAL_CONFIG,
        roster: { members: [] }
      });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0]?.path).toEqual(['roster', 'members']);
      }
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Loader
// ═══════════════════════════════════════════════════════════════════════════════

describe('resolveEnvVars', () => {
  test('substitutes set variables and blanks missing ones', () => {
    const env = { NEO4J_PASSWORD: 'test-password' };
    expect(resolveEnvVars('{env:NEO4J_PASSWORD}/{env:MISSING_VAR}', env)).toBe('test-password/');
  });

  test('leaves lowercase placeholders alone', () => {
    expect(resolveEnvVars('{env:lower}', {})).toBe('{env:lower}');
  });
});

describe('parseConfig', () => {
  test('resolves env placeholders before validating', () => {
    const text = JSON.stringify({
      ...VALID_MINIMAL_CONFIG,
      store: { ...VALID_MINIMAL_CONFIG.store, password: '{env:NEO4J_PASSWORD}' }
    });

    const result = parseConfig(text, { NEO4J_PASSWORD: 'test-password' });

    expect(result.success).toBe(true);
    if (result.success) expect(result.config.store.password).toBe('test-password');
  });

  test('loads the example config with only the LLM and store secrets set', async () => {
    const examplePath = new URL('../../config/minutes.example.json', import.meta.url);
    const text = readFileSync(examplePath, 'utf-8');

    const result = parseConfig(text, {
      OPENAI_API_KEY: 'test-key',
      NEO4J_PASSWORD: 'test-password'
    });

    expect(result.success).toBe(true);
    if (!result.success) return;
    const { tracker, wiki } = result.config;
    expect(tracker?.email).toBe('');
    expect(tracker?.apiToken).toBe('');

    // Blank Atlassian credentials leave both clients unconfigured
    if (!tracker || !wiki) throw new Error('example config has tracker and wiki sections');
    expect(new JiraClient(tracker).isConfigured).toBe(false);
    const wikiClient = new ConfluenceClient(wiki);
    expect(wikiClient.isConfigured).toBe(false);
    expect(await wikiClient.createOrUpdatePage('Standup', '<p>notes</p>')).toEqual({
      kind: 'fallback',
      status: 401,
      title: 'Not Authenticated',
      snippet: 'Check wiki email and apiToken.'
    });
  });

  test('reports invalid JSON', () => {
    expect(parseConfig('{ not json', {})).toEqual({ success: false, errors: ['Invalid JSON'] });
  });

  test('renders issues as path: message', () => {
    const text = JSON.stringify({
      ...VALID_MINIMAL_CONFIG,
      roster: { members: ['Alice Johnson'], aliases: { Zed: ['Z'] } }
    });

    expect(parseConfig(text, {})).toEqual({
      success: false,
      errors: ["roster.aliases.Zed: alias target 'Zed' is not a roster member"]
    });
  });
});

describe('getLLMDisplayName', () => {
  test('capitalizes built-in providers', () => {
    expect(getLLMDisplayName(buildConfig(VALID_FULL_CONFIG))).toBe('Openai');
  });

  test('uses the configured name for openai-compatible providers', () => {
    const config = buildConfig({
      ...VALID_MINIMAL_CONFIG,
      llm: {
        provider: 'openai-compatible',
        providerName: 'LM Studio',
        baseUrl: 'http://localhost:1234/v1',
        defaults: { model: 'local-model' }
      }
    });
    expect(getLLMDisplayName(config)).toBe('LM Studio');
  });

  test('is null without an LLM', () => {
    expect(getLLMDisplayName(buildConfig())).toBeNull();
  });
});
