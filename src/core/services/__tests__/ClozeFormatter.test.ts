import { ClozeError } from '../../errors';
import { ClozeAssistant, ClozeFormatter, clozeLiteral, sameSentence, unCloze } from '../ClozeFormatter';

describe('ClozeFormatter', () => {
  it('should wrap every case-insensitive occurrence of the word', () => {
    expect(clozeLiteral('test word', 'This sentence contains the test word.')).toBe(
      'This sentence contains the {{c1::test word}}.'
    );
    expect(clozeLiteral('run', 'Run, then run again.')).toBe('{{c1::Run}}, then {{c1::run}} again.');
  });

  it('should escape regular expression characters in the word', () => {
    expect(clozeLiteral('c++', 'I write c++ daily.')).toBe('I write {{c1::c++}} daily.');
  });

  it('should return null when the word does not occur', () => {
    expect(clozeLiteral('run', 'He ran a marathon.')).toBeNull();
  });

  it('should match whole words only', () => {
    expect(clozeLiteral('art', 'He started art class.')).toBe('He started {{c1::art}} class.');
    expect(clozeLiteral('art', 'She started painting.')).toBeNull();
    expect(clozeLiteral('café', 'Un café, s’il vous plaît.')).toBe('Un {{c1::café}}, s’il vous plaît.');
  });

  it('should ask the assistant when the word only occurs inside another word', async () => {
    const assistant: ClozeAssistant = { createCloze: jest.fn().mockResolvedValue('She {{c1::runs}} daily.') };

    await expect(new ClozeFormatter(assistant).format('run', 'She runs daily.')).resolves.toBe(
      'She {{c1::runs}} daily.'
    );
    expect(assistant.createCloze).toHaveBeenCalledWith('run', 'She runs daily.');
  });

  it('should ask the assistant for inflected forms', async () => {
    const assistant: ClozeAssistant = {
      createCloze: jest.fn().mockResolvedValue(' He {{c1::ran}} a marathon. '),
    };
    const formatter = new ClozeFormatter(assistant);
    await expect(formatter.format('run', 'He ran a marathon.')).resolves.toBe('He {{c1::ran}} a marathon.');
    expect(assistant.createCloze).toHaveBeenCalledWith('run', 'He ran a marathon.');
  });

  it('should throw ClozeError when the assistant answer has no cloze', async () => {
    const formatter = new ClozeFormatter({ createCloze: async () => 'He ran a marathon.' });
    await expect(formatter.format('run', 'He ran a marathon.')).rejects.toBeInstanceOf(ClozeError);
  });

  it('should throw ClozeError without an assistant', async () => {
    await expect(new ClozeFormatter().format('run', 'He ran a marathon.')).rejects.toBeInstanceOf(ClozeError);
  });

  it('should compare sentences on their plain text', () => {
    expect(unCloze('A {{c1::brisk}} walk, {{c2::really::hint}}.')).toBe('A brisk walk, really.');
    expect(sameSentence('A {{c1::brisk}} walk.', 'a  brisk walk.')).toBe(true);
    expect(sameSentence('A brisk walk.', 'A brisk run.')).toBe(false);
  });
});
