import { SourceSentence } from './SourceSentence';

export class EnrichedItem {
  constructor(
    public readonly source: SourceSentence,
    public readonly word: string,
    public readonly definition: string,
    public readonly generatedSentence: string
  ) {}

  static create(params: {
    source: SourceSentence;
    word: string;
    definition: string;
    generatedSentence: string;
  }): EnrichedItem {
    return new EnrichedItem(
      params.source,
      params.word.trim(),
      params.definition.trim(),
      params.generatedSentence.trim()
    );
  }

  get id(): string {
    return this.source.id;
  }

  get entryText(): string {
    return this.source.entryText;
  }

  get sentence(): string {
    return this.source.sentence;
  }

  get tags(): readonly string[] {
    return this.source.tags;
  }

  // Original context first, generated sentence second.
  sentences(): string[] {
    const sentences = this.source.hasContext() ? [this.source.sentence] : [];
    if (this.generatedSentence) sentences.push(this.generatedSentence);
    return sentences;
  }
}
