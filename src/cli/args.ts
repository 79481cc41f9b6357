import { z } from 'zod';
import { ConfigurationError } from '../core/errors';
import { SourceKind } from '../core/services/SentenceSource';
import { parseTagList } from '../core/services/TagAssembler';

export interface CliOptions {
  source: SourceKind;
  csvFile?: string;
  textFile?: string;
  tags: string[];
  help: boolean;
}

const sourceSchema = z.enum(['todoist', 'csv', 'text_file']);

export const USAGE = [
  'Usage: sentence-miner [--source todoist|csv|text_file] [--csv-file <path>] [--text-file <path>] [--tags <a,b>]',
  '',
  '  --source      data source to mine (default: todoist)',
  '  --csv-file    CSV with header id,entry_text,sentence,tags (required for --source csv)',
  '  --text-file   text file, one line per item, word marked as **word** (required for --source text_file)',
  '  -t, --tags    comma-separated tags added to every note, e.g. "Topic::Literature,Critical"',
  '  -h, --help    show this help',
].join('\n');

const VALUE_FLAGS: Record<string, 'source' | 'csvFile' | 'textFile' | 'tags'> = {
  '--source': 'source',
  '--csv-file': 'csvFile',
  '--text-file': 'textFile',
  '--tags': 'tags',
  '-t': 'tags',
};

// Accepts `--flag value` and `--flag=value`. `argv` excludes the node binary and script path.
export function parseArgs(argv: readonly string[]): CliOptions {
  const values: Partial<Record<'source' | 'csvFile' | 'textFile' | 'tags', string>> = {};
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') {
      help = true;
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq > 0 && arg.startsWith('--') ? arg.slice(0, eq) : arg;
    const target = VALUE_FLAGS[flag];
    if (!target) throw new ConfigurationError(`Unknown argument: ${arg}\n\n${USAGE}`);

    let value: string | undefined;
    if (flag !== arg) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigurationError(`Missing value for ${flag}`);
    }
    values[target] = value;
  }

  const source = sourceSchema.safeParse(values.source ?? 'todoist');
  if (!source.success) {
    throw new ConfigurationError(`Invalid --source "${values.source}"; expected todoist, csv or text_file`);
  }

  const options: CliOptions = {
    source: source.data,
    csvFile: values.csvFile,
    textFile: values.textFile,
    tags: parseTagList(values.tags),
    help,
  };
  if (help) return options;

  if (options.source === 'csv' && !options.csvFile) {
    throw new ConfigurationError('--csv-file is required when --source csv is used');
  }
  if (options.source === 'text_file' && !options.textFile) {
    throw new ConfigurationError('--text-file is required when --source text_file is used');
  }
  return options;
}
