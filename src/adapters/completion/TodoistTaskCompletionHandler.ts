import { CompletionError, errorMessage } from '../../core/errors';
import { Logger } from '../../core/services/Logger';
import { TaskCompletionHandler } from '../../core/services/TaskCompletionHandler';
import { TodoistClient } from '../todoist/TodoistClient';

export class TodoistTaskCompletionHandler implements TaskCompletionHandler {
  constructor(private client: TodoistClient, private logger: Logger) {}

  async markComplete(itemId: string): Promise<void> {
    try {
      await this.client.closeTask(itemId);
      this.logger.info(`Task ${itemId} completed.`);
    } catch (error) {
      throw new CompletionError(`Error completing task ${itemId}: ${errorMessage(error)}`, { cause: error });
    }
  }

  // Adds the label without removing existing ones.
  async flagForReview(itemId: string, label: string): Promise<void> {
    try {
      const task = await this.client.getTask(itemId);
      if (task.labels.includes(label)) {
        this.logger.info(`Task ${itemId} already has label '${label}'.`);
        return;
      }
      await this.client.updateTaskLabels(itemId, [...task.labels, label]);
      this.logger.info(`Added label '${label}' to task ${itemId}.`);
    } catch (error) {
      throw new CompletionError(`Error adding label '${label}' to task ${itemId}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
