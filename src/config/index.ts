import dotenv from 'dotenv';
import { ZodError } from 'zod';
import { ConfigurationError } from '../core/errors';
import { configSchema, Config } from './validation';

type Env = Record<string, string | undefined>;

// Load environment variables based on NODE_ENV
export function loadEnvFile(env: Env = process.env): void {
  const envFile = env.NODE_ENV === 'production' ? '.env.production' : '.env';
  dotenv.config({ path: envFile });
}

function int(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function optionalFloat(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Builds the run configuration from environment variables. Secrets are checked
 * here so a missing key stops the run before any network call is made.
 */
export function loadConfig(env: Env = process.env): Config {
  const raw = {
    logging: {
      level: env.LOG_LEVEL || 'info',
      filePath: blankToUndefined(env.LOG_FILE),
      rotate: env.LOG_ROTATE || 'none',
      maxSizeMB: int(env.LOG_MAX_SIZE_MB, 10),
      maxFiles: int(env.LOG_MAX_FILES, 5),
    },
    nodeEnv: env.NODE_ENV || 'development',
    llm: {
      apiKey: env.OPENAI_API_KEY ?? '',
      baseURL: env.OPENAI_BASE_URL || 'https://api.openai.com/v1',
      model: env.LLM_MODEL || 'gpt-4o-mini',
      temperature: optionalFloat(env.LLM_TEMPERATURE),
      timeoutMs: int(env.LLM_TIMEOUT_MS, 60000),
      retry: {
        maxAttempts: int(env.LLM_MAX_ATTEMPTS, 6),
        baseDelayMs: 1000,
        maxDelayMs: 60000,
        jitter: true,
      },
    },
    anki: {
      url: env.ANKICONNECT_URL || 'http://127.0.0.1:8765',
      key: blankToUndefined(env.ANKICONNECT_KEY),
      deckName: env.ANKI_DECK_NAME || 'sentence-mining',
      modelName: env.ANKI_MODEL_NAME || 'English sentence-mining Model',
      timeoutMs: int(env.ANKICONNECT_TIMEOUT_MS, 20000),
      retry: {
        maxAttempts: int(env.ANKICONNECT_MAX_RETRIES, 3),
        baseDelayMs: int(env.ANKICONNECT_RETRY_DELAY_MS, 3000),
        maxDelayMs: 30000,
        jitter: true,
      },
      fieldText: blankToUndefined(env.ANKI_FIELD_TEXT),
      fieldWord: blankToUndefined(env.ANKI_FIELD_WORD),
      fieldDefinition: blankToUndefined(env.ANKI_FIELD_DEFINITION),
      fieldContext: blankToUndefined(env.ANKI_FIELD_CONTEXT),
      fieldKey: blankToUndefined(env.ANKI_FIELD_KEY),
    },
    todoist: {
      apiKey: blankToUndefined(env.TODOIST_API_KEY),
      baseUrl: env.TODOIST_BASE_URL || 'https://api.todoist.com/api/v1',
      projectName: env.TODOIST_PROJECT_NAME || 'english-words',
      errorLabel: env.TODOIST_ERROR_TAG || 'needs_review',
      retry: {
        maxAttempts: 3,
        baseDelayMs: 1000,
        maxDelayMs: 10000,
        jitter: true,
      },
    },
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function requireTodoistKey(config: Config): string {
  if (!config.todoist.apiKey) {
    throw new ConfigurationError('TODOIST_API_KEY is required for the todoist source');
  }
  return config.todoist.apiKey;
}

export type { Config } from './validation';
