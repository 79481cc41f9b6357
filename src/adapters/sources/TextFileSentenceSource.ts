import fs from 'fs/promises';
import { SourceSentence } from '../../core/entities/SourceSentence';
import { FetchError, errorMessage } from '../../core/errors';
import { Logger } from '../../core/services/Logger';
import { SentenceSource } from '../../core/services/SentenceSource';
import { removeBoldMarkers } from '../../core/services/WordExtractor';

export const TEXT_FILE_TAG = 'Type::TextFile';

/**
 * One item per non-empty line. The word to learn is marked with double
 * asterisks: `The results were **unequivocal**.`
 */
export class TextFileSentenceSource implements SentenceSource {
  readonly kind = 'text_file' as const;

  constructor(private filePath: string, private logger: Logger) {}

  async fetchSentences(): Promise<SourceSentence[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      throw new FetchError(this.kind, `Cannot read text file ${this.filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const sentences: SourceSentence[] = [];
    content.split(/\r?\n/).forEach((line, index) => {
      const clean = line.trim();
      if (!clean) return;
      sentences.push(
        SourceSentence.create({
          id: `textfile-${index + 1}`,
          entryText: clean,
          sentence: removeBoldMarkers(clean),
          tags: [TEXT_FILE_TAG],
        })
      );
    });

    this.logger.info(`Read ${sentences.length} line(s) from ${this.filePath}`);
    return sentences;
  }
}
