import { SourceSentence } from '../entities/SourceSentence';

export type SourceKind = 'todoist' | 'csv' | 'text_file';

export interface SentenceSource {
  readonly kind: SourceKind;
  // Finite, ordered list of items to mine. Throws FetchError when the source cannot be read.
  fetchSentences(): Promise<SourceSentence[]>;
}
