import { EnrichedItem } from '../core/entities/EnrichedItem';
import { NoteAction } from '../core/entities/Note';
import { SourceSentence } from '../core/entities/SourceSentence';
import { EnrichmentError, FetchError, WriteError, errorMessage } from '../core/errors';
import { LLMEnricher } from '../core/services/LLMEnricher';
import { Logger } from '../core/services/Logger';
import { NoteStore } from '../core/services/NoteStore';
import { SentenceSource } from '../core/services/SentenceSource';
import { TaskCompletionHandler } from '../core/services/TaskCompletionHandler';
import { WordExtractor, firstWord, stripMarkdownFormatting } from '../core/services/WordExtractor';
import { WriteNoteUseCase } from './WriteNoteUseCase';

export interface RunSummary {
  total: number;
  created: number;
  overwritten: number;
  appended: number;
  skipped: number;
  failed: number;
  completionFailures: number;
  fetchFailed: boolean;
}

export interface MineSentencesDeps {
  source: SentenceSource;
  completionHandler: TaskCompletionHandler;
  wordExtractor: WordExtractor;
  enricher: LLMEnricher;
  noteStore: NoteStore;
  noteWriter: WriteNoteUseCase;
  logger: Logger;
}

export interface MineSentencesOptions {
  batchTags: readonly string[];
  errorLabel: string;
}

type ItemResult = { status: 'written'; action: NoteAction; completed: boolean } | { status: 'failed' };

export function emptySummary(): RunSummary {
  return {
    total: 0,
    created: 0,
    overwritten: 0,
    appended: 0,
    skipped: 0,
    failed: 0,
    completionFailures: 0,
    fetchFailed: false,
  };
}

/**
 * Drives one mining run: fetch items from the source, then for each item in
 * order extract the word, enrich it, write the note and mark the item done.
 * A failing item is flagged for review and the run moves on.
 */
export class MineSentencesUseCase {
  constructor(private deps: MineSentencesDeps, private options: MineSentencesOptions) {}

  async execute(): Promise<RunSummary> {
    const { logger, source, noteStore } = this.deps;
    const summary = emptySummary();
    logger.time('mining-run');
    logger.info(`Starting sentence mining from source "${source.kind}"...`);

    // Unreachable store aborts the whole run.
    await noteStore.initialize();

    let items: SourceSentence[];
    try {
      items = await source.fetchSentences();
    } catch (error) {
      if (!(error instanceof FetchError)) throw error;
      logger.error(`Could not fetch items from "${source.kind}": ${error.message}`, error.cause);
      summary.fetchFailed = true;
      logger.timeEnd('mining-run');
      return summary;
    }

    summary.total = items.length;
    if (items.length === 0) {
      logger.info('No sentences found from the data source.');
      logger.timeEnd('mining-run');
      return summary;
    }
    logger.info(`Found ${items.length} sentence(s) to process.`);

    for (const [index, item] of items.entries()) {
      logger.info(`--- Processing item ${index + 1}/${items.length}: ${item.entryText} (id ${item.id}) ---`);
      const result = await this.processItem(item);
      if (result.status === 'failed') {
        summary.failed += 1;
        continue;
      }
      summary[result.action] += 1;
      if (!result.completed) summary.completionFailures += 1;
    }

    const elapsed = logger.timeEnd('mining-run');
    logger.info(
      `Sentence mining finished in ${elapsed}ms. Created ${summary.created}, overwritten ${summary.overwritten}, ` +
        `appended ${summary.appended}, skipped ${summary.skipped}, failed ${summary.failed}.`
    );
    return summary;
  }

  private resolveWord(item: SourceSentence): string {
    const extracted = this.deps.wordExtractor.extract(item.entryText) || firstWord(item.sentence);
    return stripMarkdownFormatting(extracted);
  }

  private async processItem(item: SourceSentence): Promise<ItemResult> {
    const { logger, enricher, noteWriter, completionHandler } = this.deps;

    const word = this.resolveWord(item);
    if (!word) {
      logger.warn(`Could not extract a word from "${item.entryText}"; skipping item ${item.id}.`);
      await this.flag(item);
      return { status: 'failed' };
    }
    logger.info(`Processing word: "${word}"`);

    let enriched: EnrichedItem;
    try {
      enriched = await enricher.enrich(item, word);
    } catch (error) {
      const kind = error instanceof EnrichmentError ? 'Enrichment failed' : 'Unexpected enrichment error';
      logger.warn(`${kind} for "${word}" (item ${item.id}); flagged for manual review. ${errorMessage(error)}`);
      await this.flag(item);
      return { status: 'failed' };
    }
    logger.info(`Definition for "${word}": ${enriched.definition}`);

    let action: NoteAction;
    try {
      const outcome = await noteWriter.write(enriched, this.options.batchTags);
      action = outcome.action;
    } catch (error) {
      const reason = error instanceof WriteError ? error.reason : 'unexpected';
      logger.error(`Writing the note for "${word}" (item ${item.id}) failed [${reason}]: ${errorMessage(error)}`);
      await this.flag(item);
      return { status: 'failed' };
    }

    try {
      await completionHandler.markComplete(item.id);
    } catch (error) {
      // The note is already written; a later run will reconcile it by key.
      logger.error(`Could not mark item ${item.id} complete: ${errorMessage(error)}`);
      return { status: 'written', action, completed: false };
    }

    logger.info(`--- Finished item for "${word}" ---`);
    return { status: 'written', action, completed: true };
  }

  private async flag(item: SourceSentence): Promise<void> {
    try {
      await this.deps.completionHandler.flagForReview(item.id, this.options.errorLabel);
    } catch (error) {
      this.deps.logger.warn(`Could not flag item ${item.id} for review: ${errorMessage(error)}`);
    }
  }
}
