import { mergeTags } from '../services/TagAssembler';

export class SourceSentence {
  constructor(
    public readonly id: string,
    public readonly entryText: string,
    public readonly sentence: string,
    public readonly tags: readonly string[]
  ) {}

  static create(params: {
    id: string;
    entryText: string;
    sentence?: string | null;
    tags?: readonly string[];
  }): SourceSentence {
    return new SourceSentence(
      params.id.trim(),
      params.entryText.trim(),
      (params.sentence ?? '').trim(),
      mergeTags(params.tags ?? [])
    );
  }

  hasContext(): boolean {
    return this.sentence.length > 0;
  }
}
