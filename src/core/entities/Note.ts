export type NoteAction = 'created' | 'overwritten' | 'appended' | 'skipped';

export interface NoteOutcome {
  action: NoteAction;
  noteId: number;
  key: string;
  tags: string[];
}

export const SENTENCE_SEPARATOR = '<br>';

export class ExistingNote {
  constructor(
    public readonly noteId: number,
    public readonly sentences: readonly string[],
    public readonly tags: readonly string[],
    public readonly cardIds: readonly number[],
    public readonly studied: boolean
  ) {}

  static fromText(params: {
    noteId: number;
    text: string;
    tags: readonly string[];
    cardIds: readonly number[];
    intervals: readonly number[];
  }): ExistingNote {
    return new ExistingNote(
      params.noteId,
      splitSentences(params.text),
      params.tags,
      params.cardIds,
      params.intervals.some((interval) => interval > 0)
    );
  }
}

export function splitSentences(text: string): string[] {
  return text
    .split(/<br\s*\/?>/i)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function joinSentences(sentences: readonly string[]): string {
  return sentences.join(SENTENCE_SEPARATOR);
}

// Lower-cased, whitespace-collapsed form used to derive the note key.
export function normalizeKeyPart(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toLowerCase();
}

function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

// Anki search matching the notes of one deck and model that carry `key`.
export function noteKeyQuery(deckName: string, modelName: string, keyField: string, key: string): string {
  return [
    `deck:"${escapeQueryValue(deckName)}"`,
    `note:"${escapeQueryValue(modelName)}"`,
    `${keyField}:"${escapeQueryValue(key)}"`,
  ].join(' ');
}

export function noteKeyMaterial(word: string, definition: string): string {
  return `${normalizeKeyPart(word)}\u001f${normalizeKeyPart(definition)}`;
}
