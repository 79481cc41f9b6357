import { ClozeError } from '../errors';

export interface ClozeAssistant {
  // Asks for `sentence` with the (possibly inflected) `word` wrapped as {{c1::...}}.
  createCloze(word: string, sentence: string): Promise<string>;
}

const CLOZE_MARK = '{{c1::';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Whole-word, case-insensitive match; `art` does not match inside `started`.
export function clozeLiteral(word: string, sentence: string): string | null {
  const pattern = new RegExp(`(?<![\\p{L}\\p{N}])(${escapeRegExp(word)})(?![\\p{L}\\p{N}])`, 'giu');
  if (!pattern.test(sentence)) return null;
  pattern.lastIndex = 0;
  return sentence.replace(pattern, '{{c1::$1}}');
}

// Plain text of a cloze sentence; used to compare sentences already on a note.
export function unCloze(sentence: string): string {
  return sentence.replace(/\{\{c\d+::(.*?)(?:::[^}]*)?\}\}/g, '$1');
}

export function sameSentence(a: string, b: string): boolean {
  const norm = (s: string) => unCloze(s).trim().replace(/\s+/g, ' ').toLowerCase();
  return norm(a) === norm(b);
}

export class ClozeFormatter {
  constructor(private assistant?: ClozeAssistant) {}

  async format(word: string, sentence: string): Promise<string> {
    const literal = clozeLiteral(word, sentence);
    if (literal) return literal;

    if (!this.assistant) {
      throw new ClozeError(`"${word}" does not occur in: ${sentence}`);
    }
    const assisted = (await this.assistant.createCloze(word, sentence)).trim();
    if (!assisted.includes(CLOZE_MARK)) {
      throw new ClozeError(`Could not place a cloze for "${word}" in: ${sentence}`);
    }
    return assisted;
  }

  async formatAll(word: string, sentences: readonly string[]): Promise<string[]> {
    const out: string[] = [];
    for (const sentence of sentences) {
      out.push(await this.format(word, sentence));
    }
    return out;
  }
}
