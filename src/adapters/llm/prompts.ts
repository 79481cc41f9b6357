// Centralized prompt templates for LLM enrichment

export function buildSystemPrompt(): string {
  return [
    'You help an English learner build cloze flashcards.',
    'Return strictly valid JSON matching the provided schema.',
    'Rules:',
    '- Definition: one concise sentence giving the meaning of the word as used in the context; no extra commentary.',
    '- ExampleSentence: one new, natural sentence that uses the exact word in a different context and makes its meaning clear.',
    "- ExampleSentence must not copy the learner's original sentence.",
  ].join(' ');
}

export function buildUserPrompt(word: string, entryText: string, sentence: string): string {
  const lines = [`Word: "${word}".`];
  if (entryText && entryText !== word) lines.push(`Entry as captured: "${entryText}".`);
  if (sentence) {
    lines.push(`The word appeared in this sentence: "${sentence}".`);
    lines.push(`Based on this context, what is the most likely meaning of "${word}"?`);
  } else {
    lines.push(`No context sentence is available; give the most common meaning of "${word}".`);
  }
  lines.push('Return an object { "Definition": ..., "ExampleSentence": ... }.');
  return lines.join(' ');
}

export function buildClozeSystemPrompt(): string {
  return [
    'You are an Anki expert. Create a cloze deletion for the given sentence.',
    'Find the word provided by the user, or its inflected form (plural, past tense, etc.), in the sentence.',
    "Wrap ONLY that word or phrase with Anki's cloze syntax, like this: '{{c1::word}}'.",
    'Return only the modified sentence, without explanation.',
  ].join(' ');
}

export function buildClozeUserPrompt(word: string, sentence: string): string {
  return [
    `The word to be clozed is '${word}'.`,
    `The sentence is: ${sentence}`,
    "Example: for 'run' and 'He ran a marathon.' the output is 'He {{c1::ran}} a marathon.'.",
  ].join('\n');
}
