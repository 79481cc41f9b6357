import { noteKeyMaterial } from '../entities/Note';

export interface HashService {
  computeHash(content: string): Promise<string>;
}

// Deterministic note key for a (word, definition) pair.
export function computeNoteKey(hashService: HashService, word: string, definition: string): Promise<string> {
  return hashService.computeHash(noteKeyMaterial(word, definition));
}
