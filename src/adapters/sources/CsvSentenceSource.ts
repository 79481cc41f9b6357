import fs from 'fs/promises';
import { parse } from 'csv-parse';
import { z } from 'zod';
import { SourceSentence } from '../../core/entities/SourceSentence';
import { FetchError, errorMessage } from '../../core/errors';
import { Logger } from '../../core/services/Logger';
import { SentenceSource } from '../../core/services/SentenceSource';
import { parseTagList } from '../../core/services/TagAssembler';

const rowSchema = z.object({
  id: z.string().optional(),
  entry_text: z.string().trim().min(1),
  sentence: z.string().optional(),
  tags: z.string().optional(),
});

const recordsSchema = z.array(z.array(z.string()));

function parseCsv(content: string): Promise<string[][]> {
  return new Promise((resolve, reject) => {
    parse(
      content,
      { bom: true, skip_empty_lines: true, trim: true, relax_column_count: true },
      (err, records: unknown) => {
        if (err) return reject(err);
        const parsed = recordsSchema.safeParse(records);
        resolve(parsed.success ? parsed.data : []);
      }
    );
  });
}

// Rows with header `id, entry_text, sentence, tags`; `tags` is a comma-separated list.
export class CsvSentenceSource implements SentenceSource {
  readonly kind = 'csv' as const;

  constructor(private filePath: string, private logger: Logger) {}

  async fetchSentences(): Promise<SourceSentence[]> {
    let records: string[][];
    try {
      const content = await fs.readFile(this.filePath, 'utf-8');
      records = await parseCsv(content);
    } catch (error) {
      throw new FetchError(this.kind, `Cannot read CSV file ${this.filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const [header = [], ...rows] = records;
    const sentences: SourceSentence[] = [];
    rows.forEach((fields, index) => {
      const row: Record<string, string> = {};
      header.forEach((column, i) => {
        if (i < fields.length) row[column] = fields[i];
      });
      // An unquoted tag list spills into extra fields; keep them as tags.
      const extra = fields.slice(header.length).filter(Boolean);
      if (extra.length > 0) {
        this.logger.warn(`CSV row ${index + 1} has ${extra.length} extra field(s); treating them as tags`);
        row.tags = [row.tags, ...extra].filter(Boolean).join(',');
      }

      const parsed = rowSchema.safeParse(row);
      if (!parsed.success) {
        this.logger.warn(`Skipping CSV row ${index + 1}: missing entry_text`);
        return;
      }
      const { id, entry_text, sentence, tags } = parsed.data;
      sentences.push(
        SourceSentence.create({
          id: id && id.trim() ? id : `csv-${index + 1}`,
          entryText: entry_text,
          sentence,
          tags: parseTagList(tags),
        })
      );
    });

    this.logger.info(`Read ${sentences.length} row(s) from ${this.filePath}`);
    return sentences;
  }
}
