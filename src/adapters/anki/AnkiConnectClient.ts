import { z } from 'zod';
import { AnkiConnectError, errorMessage } from '../../core/errors';
import { noteKeyQuery } from '../../core/entities/Note';
import { Logger } from '../../core/services/Logger';
import { CardInfo, NewNote, NoteFieldNames, NoteInfo, NoteStore } from '../../core/services/NoteStore';
import { RetryOptions, RetryPolicy, withRetry } from '../../core/services/RetryPolicy';
import { clozeModelDefinition } from './noteModel';

export interface AnkiConnectOptions {
  url: string;
  key?: string;
  deckName: string;
  modelName: string;
  timeoutMs: number;
  retry: RetryPolicy;
  fields: NoteFieldNames;
  fetchFn?: typeof fetch;
  retryOptions?: Pick<RetryOptions, 'sleep' | 'random'>;
}

const envelopeSchema = z.object({
  result: z.unknown(),
  error: z.string().nullable().optional(),
});

const noteIdsSchema = z.array(z.number());
const namesSchema = z.array(z.string());
const versionSchema = z.number();
const addNoteSchema = z.number().nullable();

const notesInfoSchema = z.array(
  z.object({
    noteId: z.number(),
    modelName: z.string(),
    tags: z.array(z.string()),
    fields: z.record(z.object({ value: z.string(), order: z.number() })),
    cards: z.array(z.number()),
    mod: z.number().optional(),
  })
);

const cardsInfoSchema = z.array(
  z.object({
    cardId: z.number(),
    note: z.number(),
    interval: z.number(),
  })
);

const MIN_VERSION = 6;

export class AnkiConnectClient implements NoteStore {
  private fetchFn: typeof fetch;

  constructor(private options: AnkiConnectOptions, private logger: Logger) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  // Single POST, no retry. Transport failures and malformed envelopes are retryable;
  // an `error` reported by AnkiConnect itself is not.
  private async post(action: string, params: object): Promise<unknown> {
    const body: Record<string, unknown> = { action, version: 6, params };
    if (this.options.key) body.key = this.options.key;

    let res: Response;
    try {
      res = await this.fetchFn(this.options.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new AnkiConnectError(`AnkiConnect unreachable (${action}): ${errorMessage(error)}`, true, { cause: error });
    }
    if (!res.ok) throw new AnkiConnectError(`AnkiConnect HTTP ${res.status} (${action})`, true);

    let json: unknown;
    try {
      json = await res.json();
    } catch (error) {
      throw new AnkiConnectError(`AnkiConnect returned invalid JSON (${action})`, true, { cause: error });
    }
    const envelope = envelopeSchema.safeParse(json);
    if (!envelope.success) {
      throw new AnkiConnectError(`AnkiConnect returned a malformed response (${action})`, true);
    }
    if (envelope.data.error) {
      throw new AnkiConnectError(`AnkiConnect error (${action}): ${envelope.data.error}`, false);
    }
    return envelope.data.result;
  }

  private async once<T>(action: string, params: object, schema: z.ZodType<T>): Promise<T> {
    const parsed = schema.safeParse(await this.post(action, params));
    if (!parsed.success) {
      throw new AnkiConnectError(`Unexpected AnkiConnect result for ${action}`, false);
    }
    return parsed.data;
  }

  private retryOptions(action: string): RetryOptions {
    return {
      ...this.options.retryOptions,
      shouldRetry: (error) => error instanceof AnkiConnectError && error.retryable,
      onRetry: (error, attempt, delayMs) =>
        this.logger.warn(
          `[AnkiConnect] ${action} failed (attempt ${attempt}/${this.options.retry.maxAttempts}), retrying in ${delayMs}ms: ${errorMessage(error)}`
        ),
    };
  }

  async request<T>(action: string, params: object, schema: z.ZodType<T>): Promise<T> {
    return withRetry(() => this.once(action, params, schema), this.options.retry, this.retryOptions(action));
  }

  async initialize(): Promise<void> {
    const version = await this.request('version', {}, versionSchema);
    if (version < MIN_VERSION) {
      throw new AnkiConnectError(`AnkiConnect API version ${version} is too old (need ${MIN_VERSION})`, false);
    }
    this.logger.debug(`[AnkiConnect] API version ${version}`);

    const decks = await this.request('deckNames', {}, namesSchema);
    if (!decks.includes(this.options.deckName)) {
      this.logger.info(`[AnkiConnect] Creating deck "${this.options.deckName}"`);
      await this.request('createDeck', { deck: this.options.deckName }, z.unknown());
    }

    const models = await this.request('modelNames', {}, namesSchema);
    if (!models.includes(this.options.modelName)) {
      this.logger.info(`[AnkiConnect] Creating note model "${this.options.modelName}"`);
      await this.request('createModel', clozeModelDefinition(this.options.modelName, this.options.fields), z.unknown());
      return;
    }

    const present = await this.request('modelFieldNames', { modelName: this.options.modelName }, namesSchema);
    const { text, word, definition, context, key } = this.options.fields;
    const missing = [text, word, definition, context, key].filter((field) => !present.includes(field));
    if (missing.length > 0) {
      throw new AnkiConnectError(
        `Note model "${this.options.modelName}" lacks field(s): ${missing.join(', ')}`,
        false
      );
    }
  }

  findNotes(query: string): Promise<number[]> {
    return this.request('findNotes', { query }, noteIdsSchema);
  }

  async notesInfo(noteIds: number[]): Promise<NoteInfo[]> {
    if (noteIds.length === 0) return [];
    return this.request('notesInfo', { notes: noteIds }, notesInfoSchema);
  }

  async cardsInfo(cardIds: number[]): Promise<CardInfo[]> {
    if (cardIds.length === 0) return [];
    return this.request('cardsInfo', { cards: cardIds }, cardsInfoSchema);
  }

  // A failed attempt may still have added the note, so later attempts look it up
  // by key before adding again.
  async addNote(note: NewNote): Promise<number> {
    const key = note.fields[this.options.fields.key];
    const id = await withRetry(
      async (attempt) => {
        if (attempt > 1 && key) {
          const query = noteKeyQuery(note.deckName, note.modelName, this.options.fields.key, key);
          const found = await this.once('findNotes', { query }, noteIdsSchema);
          if (found.length > 0) {
            this.logger.warn(`[AnkiConnect] Note with key ${key} was added by an earlier attempt`);
            return Math.max(...found);
          }
        }
        return this.once('addNote', { note }, addNoteSchema);
      },
      this.options.retry,
      this.retryOptions('addNote')
    );
    if (id === null) throw new AnkiConnectError('AnkiConnect did not create the note', false);
    return id;
  }

  async updateNoteFields(noteId: number, fields: Record<string, string>): Promise<void> {
    await this.request('updateNoteFields', { note: { id: noteId, fields } }, z.unknown());
  }

  async updateNoteTags(noteId: number, tags: string[]): Promise<void> {
    await this.request('updateNoteTags', { note: noteId, tags }, z.unknown());
  }

  async forgetCards(cardIds: number[]): Promise<void> {
    if (cardIds.length === 0) return;
    await this.request('forgetCards', { cards: cardIds }, z.unknown());
  }
}
