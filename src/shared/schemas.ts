import { z } from 'zod';
import { CHANGE_LIMITS } from '../list/limits.js';

export const PrioritySchema = z.enum(['low', 'medium', 'high']);

export const EnrichmentParamsSchema = z.object({
  url: z.string().url(),
  priority: PrioritySchema.default('medium'),
  max_summary_length: z.number().int().min(10).max(1000).default(200),
  language: z.string().min(1).default('en'),
});

export const AppConfigSchema = z.object({
  version: z.string().default('1'),
  list: z
    .object({
      file: z.string().min(1).default('repo-list.yaml'),
      repo_path: z.string().min(1).default('.'),
    })
    .default({}),
  github: z
    .object({
      api_base: z.string().url().default('https://api.github.com'),
      token: z.string().min(1).optional(),
      user_agent: z.string().min(1).default('repolist-curator'),
    })
    .default({}),
  llm: z
    .object({
      api_base: z.string().url().default('https://api.openai.com/v1'),
      api_key: z.string().min(1).optional(),
      model: z.string().min(1).default('gpt-4o-mini'),
      temperature: z.number().min(0).max(2).default(0.3),
    })
    .default({}),
  storage: z
    .object({
      dir: z.string().min(1).optional(),
    })
    .default({}),
  api: z
    .object({
      host: z.string().min(1).default('127.0.0.1'),
      port: z.number().int().min(1).max(65535).default(7810),
    })
    .default({}),
  limits: z
    .object({
      automated: z.number().int().min(0).default(CHANGE_LIMITS.automated),
      contributor: z.number().int().min(0).default(CHANGE_LIMITS.contributor),
    })
    .default({}),
});

// ── GitHub REST responses ───────────────────────────────────────────────────

export const GitHubContentEntrySchema = z.object({
  type: z.string(),
  name: z.string(),
  path: z.string(),
  size: z.number().optional(),
});

export const GitHubDirectoryListingSchema = z.array(GitHubContentEntrySchema);

export const GitHubFileSchema = z.object({
  type: z.literal('file'),
  name: z.string(),
  path: z.string(),
  sha: z.string(),
  size: z.number().int().nonnegative(),
  encoding: z.string(),
  content: z.string(),
  download_url: z.string().nullable(),
});

export const GitHubErrorBodySchema = z.object({
  message: z.string(),
});

// ── OpenAI-compatible chat completion ───────────────────────────────────────

export const ChatCompletionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .min(1),
});

// ── Persisted pipeline state ────────────────────────────────────────────────

export const PipelineStepSchema = z.enum([
  'fetch_readme',
  'upload_readme',
  'summarize',
  'upload_summary',
  'enqueue',
]);

export const ReadmeFetchResultSchema = z.discriminatedUnion('found', [
  z.object({
    found: z.literal(true),
    owner: z.string(),
    repo: z.string(),
    repo_url: z.string(),
    name: z.string(),
    sha: z.string(),
    size: z.number(),
    download_url: z.string().nullable(),
    content: z.string(),
  }),
  z.object({
    found: z.literal(false),
    repo_url: z.string(),
    reason: z.string(),
  }),
]);

export const StoredObjectSchema = z.object({
  bucket: z.string(),
  key: z.string(),
  size: z.number().int().nonnegative(),
  checksum: z.string(),
});

export const SummaryResultSchema = z.object({
  summary: z.string(),
  original_words: z.number().int().nonnegative(),
  summary_words: z.number().int().nonnegative(),
  model: z.string(),
});

export const EnqueueResultSchema = z.object({
  message_id: z.string(),
  inserted: z.boolean(),
});

export const StepLedgerSchema = z.object({
  fetch_readme: ReadmeFetchResultSchema.optional(),
  upload_readme: StoredObjectSchema.optional(),
  summarize: SummaryResultSchema.optional(),
  upload_summary: StoredObjectSchema.optional(),
  enqueue: EnqueueResultSchema.optional(),
});

const UploadRefSchema = z.object({
  key: z.string(),
  size: z.number().int().nonnegative(),
  checksum: z.string(),
});

export const EnrichmentPayloadSchema = z.object({
  url: z.string(),
  upload: UploadRefSchema,
  summary_upload: UploadRefSchema,
  summary_metrics: z.object({
    original_words: z.number().int().nonnegative(),
    summary_words: z.number().int().nonnegative(),
  }),
});

export const RunCompletionSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('success'), message_id: z.string(), payload: EnrichmentPayloadSchema }),
  z.object({ status: z.literal('skipped'), reason: z.string() }),
  z.object({
    status: z.literal('failed'),
    failed_step: PipelineStepSchema,
    error_name: z.string(),
    reason: z.string(),
  }),
]);

export const RunStateSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('active'), step: PipelineStepSchema }),
  z.object({ kind: z.literal('completed'), completion: RunCompletionSchema }),
]);
