import { MarkerWordExtractor, firstWord, removeBoldMarkers, stripMarkdownFormatting } from '../WordExtractor';

describe('MarkerWordExtractor', () => {
  const extractor = new MarkerWordExtractor();

  it.each([
    ['The ruling was **unequivocal** in its wording.', 'unequivocal'],
    ['English: {bereft}', 'bereft'],
    ['english: bereft', 'bereft'],
    ['English {take stock}', 'take stock'],
    ['english headspace', 'headspace'],
    ['{serendipity}', 'serendipity'],
    ['  test word  ', 'test word'],
  ])('should extract from %p', (entry, expected) => {
    expect(extractor.extract(entry)).toBe(expected);
  });

  it('should prefer the bold marker over a qualifier', () => {
    expect(extractor.extract('English: a **fleeting** glance')).toBe('fleeting');
  });

  it('should return an empty string for a bare qualifier', () => {
    expect(extractor.extract('English:')).toBe('');
  });
});

describe('text helpers', () => {
  it('should strip bold, italic and underscore emphasis', () => {
    expect(stripMarkdownFormatting('**bold** and *italic* and _under_')).toBe('bold and italic and under');
  });

  it('should remove bold markers but keeps the word', () => {
    expect(removeBoldMarkers('She was **adamant** about it.')).toBe('She was adamant about it.');
  });

  it('should take the first word of a sentence', () => {
    expect(firstWord('Serendipity led us there.')).toBe('Serendipity');
    expect(firstWord('   ')).toBe('');
  });
});
