import { z } from 'zod';

// Provider types
export const llmProviders = [
  'openai',
  'anthropic',
  'google',
  'ollama',
  'openai-compatible'
] as const;
export type LLMProvider = (typeof llmProviders)[number];

export const transcriptionProviders = ['openai', 'openai-compatible'] as const;
export type TranscriptionProvider = (typeof transcriptionProviders)[number];

// Operation config schema (for summary, extraction)
const llmOperationSchema = z.object({
  model: z.string().min(1),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional()
});
export type LLMOperationConfig = z.infer<typeof llmOperationSchema>;

// Atlassian credentials shared by the tracker and the wiki.
// Blank credentials are allowed: the client reports itself unconfigured
// and its stage is skipped.
const atlassianSchema = z.object({
  baseUrl: z.string().url(),
  email: z.string().default(''),
  apiToken: z.string().default('')
});

// Config schema
export const configSchema = z
  .object({
    $schema: z.string().optional(),

    server: z
      .object({
        port: z.number().int().min(1).max(65535).default(6366)
      })
      .optional(),

    llm: z
      .object({
        provider: z.enum(llmProviders),
        providerName: z.string().min(1).optional(),
        apiKey: z.string().optional(),
        baseUrl: z.string().url().optional(),
        defaults: llmOperationSchema,
        // Per-operation sampling overrides; the model is shared
        summary: llmOperationSchema.omit({ model: true }).optional(),
        extraction: llmOperationSchema.omit({ model: true }).optional()
      })
      .superRefine((data, ctx) => {
        const cloudProviders = ['openai', 'anthropic', 'google'];
        if (cloudProviders.includes(data.provider)) {
          if (!data.apiKey)
            ctx.addIssue({
              code: 'custom',
              path: ['apiKey'],
              message: `apiKey required for provider '${data.provider}'`
            });
          if (data.baseUrl)
            ctx.addIssue({
              code: 'custom',
              path: ['baseUrl'],
              message: `baseUrl not allowed for provider '${data.provider}'`
            });
        }
        if (data.provider === 'openai-compatible' && !data.baseUrl) {
          ctx.addIssue({
            code: 'custom',
            path: ['baseUrl'],
            message: "baseUrl required for provider 'openai-compatible'"
          });
        }
        if (data.provider !== 'openai-compatible' && data.providerName) {
          ctx.addIssue({
            code: 'custom',
            path: ['providerName'],
            message: "providerName only allowed for provider 'openai-compatible'"
          });
        }
      })
      .optional(),

    transcription: z
      .object({
        provider: z.enum(transcriptionProviders),
        model: z.string().min(1).default('whisper-1'),
        apiKey: z.string().optional(),
        baseUrl: z.string().url().optional()
      })
      .superRefine((data, ctx) => {
        if (data.provider === 'openai') {
          if (!data.apiKey)
            ctx.addIssue({
              code: 'custom',
              path: ['apiKey'],
              message: "apiKey required for provider 'openai'"
            });
          if (data.baseUrl)
            ctx.addIssue({
              code: 'custom',
              path: ['baseUrl'],
              message: "baseUrl not allowed for provider 'openai'"
            });
        }
        if (data.provider === 'openai-compatible' && !data.baseUrl) {
          ctx.addIssue({
            code: 'custom',
            path: ['baseUrl'],
            message: "baseUrl required for provider 'openai-compatible'"
          });
        }
      })
      .optional(),

    tracker: atlassianSchema
      .extend({
        projectKey: z.string().min(1),
        issueType: z.string().min(1).default('Task'),
        labels: z.array(z.string().min(1)).default(['meeting-action-item']),
        duplicateThreshold: z.number().min(0).max(1).default(0.85)
      })
      .optional(),

    wiki: atlassianSchema
      .extend({
        spaceKey: z.string().min(1),
        parentPageId: z.string().min(1).optional()
      })
      .optional(),

    store: z.object({
      uri: z.string().min(1),
      user: z.string().min(1),
      password: z.string(),
      database: z.string().min(1).optional()
    }),

    recordings: z
      .object({
        directory: z.string().min(1).default('recordings'),
        pollIntervalSeconds: z.number().int().positive().default(30),
        autoPoll: z.boolean().default(true)
      })
      .optional(),

    roster: z
      .object({
        members: z.array(z.string().min(1)).min(1),
        aliases: z.record(z.string(), z.array(z.string().min(1))).default({})
      })
      .superRefine((data, ctx) => {
        for (const member of Object.keys(data.aliases)) {
          if (!data.members.includes(member))
            ctx.addIssue({
              code: 'custom',
              path: ['aliases', member],
              message: `alias target '${member}' is not a roster member`
            });
        }
      }),

    pipeline: z
      .object({
        defaultDeadlineDays: z.number().int().positive().default(7),
        maxFallbackTasks: z.number().int().positive().default(10),
        minDescriptionLength: z.number().int().min(0).default(4),
        matchThreshold: z.number().min(0).max(1).default(0.6),
        transcriptExcerptLength: z.number().int().positive().default(5000)
      })
      .optional(),

    retry: z
      .object({
        maxAttempts: z.number().int().min(1).default(3),
        baseDelayMs: z.number().int().min(0).default(2000),
        maxDelayMs: z.number().int().min(0).default(10000)
      })
      .optional()
  })
  .transform((data) => {
    // Apply section defaults
    const server = {
      port: data.server?.port ?? 6366
    };
    const recordings = {
      directory: data.recordings?.directory ?? 'recordings',
      pollIntervalSeconds: data.recordings?.pollIntervalSeconds ?? 30,
      autoPoll: data.recordings?.autoPoll ?? true
    };
    const pipeline = {
      defaultDeadlineDays: data.pipeline?.defaultDeadlineDays ?? 7,
      maxFallbackTasks: data.pipeline?.maxFallbackTasks ?? 10,
      minDescriptionLength: data.pipeline?.minDescriptionLength ?? 4,
      matchThreshold: data.pipeline?.matchThreshold ?? 0.6,
      transcriptExcerptLength: data.pipeline?.transcriptExcerptLength ?? 5000
    };
    const retry = {
      maxAttempts: data.retry?.maxAttempts ?? 3,
      baseDelayMs: data.retry?.baseDelayMs ?? 2000,
      maxDelayMs: data.retry?.maxDelayMs ?? 10000
    };

    // Merge operation configs with defaults
    let llm = null;
    if (data.llm) {
      const { defaults, summary, extraction, ...llmRest } = data.llm;
      llm = {
        ...llmRest,
        defaults,
        summary: { ...defaults, ...summary },
        extraction: { ...defaults, ...extraction }
      };
    }

    return {
      ...data,
      server,
      llm,
      transcription: data.transcription ?? null,
      tracker: data.tracker ?? null,
      wiki: data.wiki ?? null,
      recordings,
      pipeline,
      retry
    };
  });

export type ConfigInput = z.input<typeof configSchema>;
export type Config = z.infer<typeof configSchema>;
export type LLMConfig = NonNullable<Config['llm']>;
export type TranscriptionConfig = NonNullable<Config['transcription']>;
export type TrackerConfig = NonNullable<Config['tracker']>;
export type WikiConfig = NonNullable<Config['wiki']>;
export type StoreConfig = Config['store'];
export type PipelineConfig = Config['pipeline'];
