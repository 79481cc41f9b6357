export interface WordExtractor {
  // Returns the word or phrase to learn, or '' when none can be found.
  extract(entryText: string): string;
}

const BOLD_MARKER = /\*\*([^*]+?)\*\*/;
const LANGUAGE_QUALIFIER = /^english(?:\s*:\s*|\s+|$)/i;

/**
 * Understands the entry formats people type into a capture inbox:
 * `He felt **bereft**.`, `English: {bereft}`, `english bereft`, `{bereft}`
 * and a bare `bereft`.
 */
export class MarkerWordExtractor implements WordExtractor {
  extract(entryText: string): string {
    let content = entryText.trim();

    const bold = content.match(BOLD_MARKER);
    if (bold && bold[1]) return bold[1].trim();

    const qualifier = content.match(LANGUAGE_QUALIFIER);
    if (qualifier) content = content.slice(qualifier[0].length).trim();

    if (content.startsWith('{') && content.endsWith('}')) {
      return content.slice(1, -1).trim();
    }
    return content;
  }
}

export function stripMarkdownFormatting(text: string): string {
  return text
    .replace(/\*\*(.*?)\*\*/g, '$1')
    .replace(/_(.*?)_/g, '$1')
    .replace(/\*(.*?)\*/g, '$1')
    .trim();
}

export function removeBoldMarkers(line: string): string {
  return line.replace(/\*\*([^*]+?)\*\*/g, '$1');
}

// Fallback when the entry holds no usable word: the sentence's first word.
export function firstWord(sentence: string): string {
  const match = sentence.trim().match(/^[\p{L}\p{N}_'-]+/u);
  return match ? match[0] : '';
}
