// Operations the note writer needs from the flashcard store. Shapes follow
// AnkiConnect's (version 6) payloads.

export interface NoteInfo {
  noteId: number;
  modelName: string;
  tags: string[];
  fields: Record<string, { value: string; order: number }>;
  cards: number[];
  mod?: number;
}

export interface CardInfo {
  cardId: number;
  note: number;
  // Days until the next review; 0 for new cards, negative (seconds) for learning cards.
  interval: number;
}

// Names of the note model's fields, configurable per collection.
export interface NoteFieldNames {
  text: string;
  word: string;
  definition: string;
  context: string;
  key: string;
}

export interface NewNote {
  deckName: string;
  modelName: string;
  fields: Record<string, string>;
  tags: string[];
  options?: {
    allowDuplicate?: boolean;
    duplicateScope?: 'deck' | 'collection';
  };
}

export interface NoteStore {
  // Checks the store is reachable and the deck and note model exist.
  initialize(): Promise<void>;
  findNotes(query: string): Promise<number[]>;
  notesInfo(noteIds: number[]): Promise<NoteInfo[]>;
  cardsInfo(cardIds: number[]): Promise<CardInfo[]>;
  addNote(note: NewNote): Promise<number>;
  updateNoteFields(noteId: number, fields: Record<string, string>): Promise<void>;
  updateNoteTags(noteId: number, tags: string[]): Promise<void>;
  forgetCards(cardIds: number[]): Promise<void>;
}
