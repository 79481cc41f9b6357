import { EnrichedItem } from '../entities/EnrichedItem';
import { SourceSentence } from '../entities/SourceSentence';
import { ClozeAssistant } from './ClozeFormatter';

export interface LLMEnricher extends ClozeAssistant {
  // Definition plus a new example sentence for `word` as used in `sentence`.
  // Throws EnrichmentError.
  enrich(sentence: SourceSentence, word: string): Promise<EnrichedItem>;
}
