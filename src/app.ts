import OpenAI from 'openai';
import { AnkiConnectClient } from './adapters/anki/AnkiConnectClient';
import { NoOpTaskCompletionHandler } from './adapters/completion/NoOpTaskCompletionHandler';
import { TodoistTaskCompletionHandler } from './adapters/completion/TodoistTaskCompletionHandler';
import { CryptoHashService } from './adapters/hash/CryptoHashService';
import { OpenAIEnricher } from './adapters/llm/OpenAIEnricher';
import { CsvSentenceSource } from './adapters/sources/CsvSentenceSource';
import { TextFileSentenceSource } from './adapters/sources/TextFileSentenceSource';
import { TodoistSentenceSource } from './adapters/sources/TodoistSentenceSource';
import { TodoistClient } from './adapters/todoist/TodoistClient';
import { MineSentencesUseCase } from './application/MineSentencesUseCase';
import { WriteNoteUseCase } from './application/WriteNoteUseCase';
import { CliOptions } from './cli/args';
import { Config, requireTodoistKey } from './config';
import { ConfigurationError } from './core/errors';
import { ClozeFormatter } from './core/services/ClozeFormatter';
import { Logger } from './core/services/Logger';
import { SentenceSource } from './core/services/SentenceSource';
import { TaskCompletionHandler } from './core/services/TaskCompletionHandler';
import { MarkerWordExtractor } from './core/services/WordExtractor';

export interface Overrides {
  fetchFn?: typeof fetch;
  now?: () => Date;
}

function buildSource(
  config: Config,
  cli: CliOptions,
  logger: Logger,
  fetchFn: typeof fetch | undefined
): { source: SentenceSource; completionHandler: TaskCompletionHandler } {
  switch (cli.source) {
    case 'todoist': {
      const client = new TodoistClient(
        { apiKey: requireTodoistKey(config), baseUrl: config.todoist.baseUrl, retry: config.todoist.retry, fetchFn },
        logger
      );
      return {
        source: new TodoistSentenceSource(client, config.todoist.projectName, logger),
        completionHandler: new TodoistTaskCompletionHandler(client, logger),
      };
    }
    case 'csv':
      if (!cli.csvFile) throw new ConfigurationError('--csv-file is required when --source csv is used');
      return {
        source: new CsvSentenceSource(cli.csvFile, logger),
        completionHandler: new NoOpTaskCompletionHandler(logger),
      };
    case 'text_file':
      if (!cli.textFile) throw new ConfigurationError('--text-file is required when --source text_file is used');
      return {
        source: new TextFileSentenceSource(cli.textFile, logger),
        completionHandler: new NoOpTaskCompletionHandler(logger),
      };
  }
}

/**
 * Wires adapters, services and handlers for one run. Throws ConfigurationError
 * before any network call when a required setting is missing.
 */
export function createMiningRun(
  config: Config,
  cli: CliOptions,
  logger: Logger,
  overrides: Overrides = {}
): MineSentencesUseCase {
  const { source, completionHandler } = buildSource(config, cli, logger, overrides.fetchFn);

  // Retries are handled by OpenAIEnricher's own policy.
  const openai = new OpenAI({
    apiKey: config.llm.apiKey,
    baseURL: config.llm.baseURL,
    timeout: config.llm.timeoutMs,
    maxRetries: 0,
    ...(overrides.fetchFn ? { fetch: overrides.fetchFn } : {}),
  });
  const enricher = new OpenAIEnricher(openai, config.llm.model, logger, {
    temperature: config.llm.temperature,
    retry: config.llm.retry,
  });

  const fields = {
    text: config.anki.fieldText,
    word: config.anki.fieldWord,
    definition: config.anki.fieldDefinition,
    context: config.anki.fieldContext,
    key: config.anki.fieldKey,
  };
  const noteStore = new AnkiConnectClient(
    {
      url: config.anki.url,
      key: config.anki.key,
      deckName: config.anki.deckName,
      modelName: config.anki.modelName,
      timeoutMs: config.anki.timeoutMs,
      retry: config.anki.retry,
      fields,
      fetchFn: overrides.fetchFn,
    },
    logger
  );

  const noteWriter = new WriteNoteUseCase(noteStore, new CryptoHashService(), new ClozeFormatter(enricher), logger, {
    deckName: config.anki.deckName,
    modelName: config.anki.modelName,
    fields,
    now: overrides.now,
  });

  return new MineSentencesUseCase(
    {
      source,
      completionHandler,
      wordExtractor: new MarkerWordExtractor(),
      enricher,
      noteStore,
      noteWriter,
      logger,
    },
    { batchTags: cli.tags, errorLabel: config.todoist.errorLabel }
  );
}
