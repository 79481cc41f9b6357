import { z } from 'zod';

const retrySchema = z.object({
  maxAttempts: z.number().int().min(1).max(20),
  baseDelayMs: z.number().min(0),
  maxDelayMs: z.number().min(0),
  jitter: z.boolean(),
});

export const configSchema = z.object({
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
    filePath: z.string().optional(),
    rotate: z.enum(['none', 'size']).default('none'),
    maxSizeMB: z.number().min(1).max(1024).default(10),
    maxFiles: z.number().min(1).max(100).default(5),
  }),
  nodeEnv: z.string(),
  llm: z.object({
    apiKey: z.string().min(1, 'OPENAI_API_KEY is required'),
    baseURL: z.string().url(),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2).optional(),
    timeoutMs: z.number().int().min(1000),
    retry: retrySchema,
  }),
  anki: z.object({
    url: z.string().url(),
    key: z.string().optional(),
    deckName: z.string().min(1),
    modelName: z.string().min(1),
    timeoutMs: z.number().int().min(100),
    retry: retrySchema,
    fieldText: z.string().default('Text'),
    fieldWord: z.string().default('Word'),
    fieldDefinition: z.string().default('Definition'),
    fieldContext: z.string().default('Context'),
    fieldKey: z.string().default('Key'),
  }),
  todoist: z.object({
    apiKey: z.string().optional(),
    baseUrl: z.string().url(),
    projectName: z.string().min(1),
    errorLabel: z.string().min(1),
    retry: retrySchema,
  }),
});

export type Config = z.infer<typeof configSchema>;
