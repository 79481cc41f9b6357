import { EnrichedItem } from '../core/entities/EnrichedItem';
import { ExistingNote, NoteOutcome, joinSentences, noteKeyQuery } from '../core/entities/Note';
import { ClozeError, WriteError, errorMessage } from '../core/errors';
import { ClozeFormatter, sameSentence } from '../core/services/ClozeFormatter';
import { HashService, computeNoteKey } from '../core/services/HashService';
import { Logger } from '../core/services/Logger';
import { NoteFieldNames, NoteStore } from '../core/services/NoteStore';
import { assembleTags, mergeTags } from '../core/services/TagAssembler';

export interface WriteNoteOptions {
  deckName: string;
  modelName: string;
  fields: NoteFieldNames;
  now?: () => Date;
}

/**
 * Writes one enriched item to the flashcard store, reconciling it with any
 * note that already carries the same (word, definition) key:
 *
 * - no note: create one
 * - studied note: overwrite its sentences and reset its scheduling
 * - unstudied note: append the sentences it does not have yet
 */
export class WriteNoteUseCase {
  private now: () => Date;

  constructor(
    private store: NoteStore,
    private hashService: HashService,
    private clozeFormatter: ClozeFormatter,
    private logger: Logger,
    private options: WriteNoteOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async write(item: EnrichedItem, extraTags: readonly string[]): Promise<NoteOutcome> {
    try {
      return await this.reconcile(item, extraTags);
    } catch (error) {
      if (error instanceof WriteError) throw error;
      if (error instanceof ClozeError) {
        throw new WriteError('cloze', error.message, { cause: error });
      }
      throw new WriteError('store', `Could not write note for "${item.word}": ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async reconcile(item: EnrichedItem, extraTags: readonly string[]): Promise<NoteOutcome> {
    const key = await computeNoteKey(this.hashService, item.word, item.definition);
    const tags = assembleTags(item.tags, extraTags, this.now());
    const clozeSentences = await this.clozeFormatter.formatAll(item.word, item.sentences());
    const existing = await this.findExisting(key);

    if (!existing) {
      const noteId = await this.store.addNote({
        deckName: this.options.deckName,
        modelName: this.options.modelName,
        fields: {
          [this.options.fields.text]: joinSentences(clozeSentences),
          [this.options.fields.word]: item.word,
          [this.options.fields.definition]: item.definition,
          [this.options.fields.context]: item.entryText,
          [this.options.fields.key]: key,
        },
        tags,
        options: { allowDuplicate: true, duplicateScope: 'deck' },
      });
      this.logger.info(`[Notes] Created note ${noteId} for "${item.word}"`);
      return { action: 'created', noteId, key, tags };
    }

    const mergedTags = mergeTags(existing.tags, tags);

    if (existing.studied) {
      await this.store.updateNoteFields(existing.noteId, {
        [this.options.fields.text]: joinSentences(clozeSentences),
        [this.options.fields.context]: item.entryText,
      });
      await this.store.forgetCards([...existing.cardIds]);
      await this.store.updateNoteTags(existing.noteId, mergedTags);
      this.logger.info(`[Notes] Overwrote studied note ${existing.noteId} for "${item.word}" and reset its progress`);
      return { action: 'overwritten', noteId: existing.noteId, key, tags: mergedTags };
    }

    const additions = clozeSentences.filter(
      (candidate) => !existing.sentences.some((present) => sameSentence(present, candidate))
    );
    await this.store.updateNoteTags(existing.noteId, mergedTags);

    if (additions.length === 0) {
      this.logger.info(`[Notes] Note ${existing.noteId} for "${item.word}" already has these sentences; skipped`);
      return { action: 'skipped', noteId: existing.noteId, key, tags: mergedTags };
    }

    await this.store.updateNoteFields(existing.noteId, {
      [this.options.fields.text]: joinSentences([...existing.sentences, ...additions]),
    });
    this.logger.info(`[Notes] Appended ${additions.length} sentence(s) to note ${existing.noteId} for "${item.word}"`);
    return { action: 'appended', noteId: existing.noteId, key, tags: mergedTags };
  }

  private async findExisting(key: string): Promise<ExistingNote | null> {
    const query = noteKeyQuery(this.options.deckName, this.options.modelName, this.options.fields.key, key);

    const noteIds = await this.store.findNotes(query);
    if (noteIds.length === 0) return null;
    if (noteIds.length > 1) {
      this.logger.warn(`[Notes] ${noteIds.length} notes share key ${key}; using the most recently modified`);
    }

    const infos = await this.store.notesInfo(noteIds);
    const newest = [...infos].sort((a, b) => (b.mod ?? 0) - (a.mod ?? 0))[0];
    if (!newest) return null;

    const cards = await this.store.cardsInfo(newest.cards);
    return ExistingNote.fromText({
      noteId: newest.noteId,
      text: newest.fields[this.options.fields.text]?.value ?? '',
      tags: newest.tags,
      cardIds: newest.cards,
      intervals: cards.map((c) => c.interval),
    });
  }
}
