import { Logger } from '../../core/services/Logger';
import { TaskCompletionHandler } from '../../core/services/TaskCompletionHandler';

// Used for read-only sources (CSV, text file) where there is nothing to complete or label.
export class NoOpTaskCompletionHandler implements TaskCompletionHandler {
  constructor(private logger: Logger) {}

  async markComplete(itemId: string): Promise<void> {
    this.logger.debug(`No-op: item ${itemId} would be marked as complete.`);
  }

  async flagForReview(itemId: string, label: string): Promise<void> {
    this.logger.info(`No-op: label '${label}' would be added to item ${itemId}.`);
  }
}
