import { SourceSentence } from '../../core/entities/SourceSentence';
import { FetchError, errorMessage } from '../../core/errors';
import { Logger } from '../../core/services/Logger';
import { SentenceSource } from '../../core/services/SentenceSource';
import { TodoistClient, TodoistTask } from '../todoist/TodoistClient';

export const TODOIST_TAG = 'Type::Todoist';

export function taskToSentence(task: TodoistTask): SourceSentence {
  return SourceSentence.create({
    id: task.id,
    entryText: task.content,
    sentence: task.description,
    tags: [...task.labels.map((label) => `TaskLabel::${label}`), TODOIST_TAG],
  });
}

// Task content holds the word, the description holds the context sentence.
export class TodoistSentenceSource implements SentenceSource {
  readonly kind = 'todoist' as const;

  constructor(private client: TodoistClient, private projectName: string, private logger: Logger) {}

  async fetchSentences(): Promise<SourceSentence[]> {
    try {
      const projects = await this.client.getProjects();
      const project = projects.find((p) => p.name === this.projectName);
      if (!project) {
        throw new FetchError(this.kind, `Todoist project "${this.projectName}" not found`);
      }
      const tasks = await this.client.getTasks(project.id);
      this.logger.info(`Fetched ${tasks.length} task(s) from Todoist project "${this.projectName}"`);
      return tasks.map(taskToSentence);
    } catch (error) {
      if (error instanceof FetchError) throw error;
      throw new FetchError(this.kind, `Error fetching tasks from Todoist: ${errorMessage(error)}`, { cause: error });
    }
  }
}
