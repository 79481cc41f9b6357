import { FetchError, TodoistError } from '../../../core/errors';
import { createMockLogger } from '../../../test/fakes';
import { TodoistClient } from '../../todoist/TodoistClient';
import { TodoistSentenceSource, taskToSentence } from '../TodoistSentenceSource';

jest.mock('../../todoist/TodoistClient');

const NO_RETRY = { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0, jitter: false };

function mockClient() {
  return jest.mocked(new TodoistClient({ apiKey: 'test-token', baseUrl: 'x', retry: NO_RETRY }, createMockLogger()));
}

describe('TodoistSentenceSource', () => {
  let client: ReturnType<typeof mockClient>;
  let source: TodoistSentenceSource;

  beforeEach(() => {
    client = mockClient();
    source = new TodoistSentenceSource(client, 'english-words', createMockLogger());
  });

  it('should map the tasks of the named project', async () => {
    client.getProjects.mockResolvedValue([
      { id: 'p0', name: 'inbox' },
      { id: 'p1', name: 'english-words' },
    ]);
    client.getTasks.mockResolvedValue([
      { id: 't1', content: 'english: {wary}', description: 'Be wary of it.', labels: ['phrasal'] },
    ]);

    const items = await source.fetchSentences();

    expect(client.getTasks).toHaveBeenCalledWith('p1');
    expect(items).toHaveLength(1);
    expect(items[0].id).toBe('t1');
    expect(items[0].entryText).toBe('english: {wary}');
    expect(items[0].sentence).toBe('Be wary of it.');
    expect(items[0].tags).toEqual(['TaskLabel::phrasal', 'Type::Todoist']);
  });

  it('should fail when the project does not exist', async () => {
    client.getProjects.mockResolvedValue([{ id: 'p0', name: 'inbox' }]);

    await expect(source.fetchSentences()).rejects.toThrow('Todoist project "english-words" not found');
  });

  it('should wrap client failures in FetchError', async () => {
    client.getProjects.mockRejectedValue(new TodoistError('Todoist HTTP 401 (GET /projects)', false, 401));

    const error = await source.fetchSentences().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error instanceof FetchError && error.sourceKind).toBe('todoist');
    expect(error instanceof FetchError && error.message).toBe(
      'Error fetching tasks from Todoist: Todoist HTTP 401 (GET /projects)'
    );
  });

  it('should keep the entry text when a task has no description', () => {
    const item = taskToSentence({ id: 't9', content: '{calm}', description: '', labels: [] });
    expect(item.sentence).toBe('');
    expect(item.tags).toEqual(['Type::Todoist']);
  });
});
