import { ConfigurationError } from '../../core/errors';
import { parseArgs } from '../args';

describe('parseArgs', () => {
  it('should default to the todoist source', () => {
    expect(parseArgs([])).toEqual({ source: 'todoist', csvFile: undefined, textFile: undefined, tags: [], help: false });
  });

  it('should accept both value forms', () => {
    expect(parseArgs(['--source=csv', '--csv-file', 'words.csv', '-t', 'Topic::Literature, Critical'])).toEqual({
      source: 'csv',
      csvFile: 'words.csv',
      textFile: undefined,
      tags: ['Topic::Literature', 'Critical'],
      help: false,
    });
  });

  it('should read a text file source', () => {
    const options = parseArgs(['--source', 'text_file', '--text-file=notes.txt']);
    expect(options.source).toBe('text_file');
    expect(options.textFile).toBe('notes.txt');
  });

  it('should skip validation when help is requested', () => {
    expect(parseArgs(['--source', 'csv', '--help']).help).toBe(true);
  });

  const invalid: Array<[string[], string]> = [
    [['--source', 'notion'], 'Invalid --source "notion"; expected todoist, csv or text_file'],
    [['--source', 'csv'], '--csv-file is required when --source csv is used'],
    [['--source', 'text_file'], '--text-file is required when --source text_file is used'],
    [['--tags'], 'Missing value for --tags'],
    [['--tags', '--source'], 'Missing value for --tags'],
  ];

  it.each(invalid)('should reject %p', (argv, message) => {
    expect(() => parseArgs(argv)).toThrow(message);
  });

  it('should reject unknown arguments', () => {
    expect(() => parseArgs(['--verbose'])).toThrow(ConfigurationError);
  });
});
