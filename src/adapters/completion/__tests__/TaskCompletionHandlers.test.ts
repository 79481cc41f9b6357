import { CompletionError, TodoistError } from '../../../core/errors';
import { createMockLogger } from '../../../test/fakes';
import { TodoistClient } from '../../todoist/TodoistClient';
import { NoOpTaskCompletionHandler } from '../NoOpTaskCompletionHandler';
import { TodoistTaskCompletionHandler } from '../TodoistTaskCompletionHandler';

jest.mock('../../todoist/TodoistClient');

const NO_RETRY = { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0, jitter: false };

function mockClient() {
  return jest.mocked(new TodoistClient({ apiKey: 'test-token', baseUrl: 'x', retry: NO_RETRY }, createMockLogger()));
}

describe('TodoistTaskCompletionHandler', () => {
  let client: ReturnType<typeof mockClient>;
  let handler: TodoistTaskCompletionHandler;

  beforeEach(() => {
    client = mockClient();
    handler = new TodoistTaskCompletionHandler(client, createMockLogger());
  });

  it('should close the task', async () => {
    client.closeTask.mockResolvedValue(undefined);

    await handler.markComplete('t1');

    expect(client.closeTask).toHaveBeenCalledWith('t1');
  });

  it('should report a failed close as CompletionError', async () => {
    client.closeTask.mockRejectedValue(new TodoistError('Todoist HTTP 404 (POST /tasks/t1/close)', false, 404));

    await expect(handler.markComplete('t1')).rejects.toBeInstanceOf(CompletionError);
  });

  it('should add the review label to the existing ones', async () => {
    client.getTask.mockResolvedValue({ id: 't1', content: 'x', description: '', labels: ['phrasal'] });
    client.updateTaskLabels.mockResolvedValue(undefined);

    await handler.flagForReview('t1', 'needs_review');

    expect(client.updateTaskLabels).toHaveBeenCalledWith('t1', ['phrasal', 'needs_review']);
  });

  it('should leave a task that already has the label', async () => {
    client.getTask.mockResolvedValue({ id: 't1', content: 'x', description: '', labels: ['needs_review'] });

    await handler.flagForReview('t1', 'needs_review');

    expect(client.updateTaskLabels).not.toHaveBeenCalled();
  });
});

describe('NoOpTaskCompletionHandler', () => {
  it('should only log', async () => {
    const logger = createMockLogger();
    const handler = new NoOpTaskCompletionHandler(logger);

    await handler.markComplete('csv-1');
    await handler.flagForReview('csv-1', 'needs_review');

    expect(logger.debug).toHaveBeenCalledWith('No-op: item csv-1 would be marked as complete.');
    expect(logger.info).toHaveBeenCalledWith("No-op: label 'needs_review' would be added to item csv-1.");
  });
});
