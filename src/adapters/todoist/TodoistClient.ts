import { z } from 'zod';
import { TodoistError, errorMessage } from '../../core/errors';
import { Logger } from '../../core/services/Logger';
import { RetryOptions, RetryPolicy, withRetry } from '../../core/services/RetryPolicy';

const projectSchema = z.object({
  id: z.string(),
  name: z.string(),
});

const taskSchema = z.object({
  id: z.string(),
  content: z.string(),
  description: z.string().default(''),
  labels: z.array(z.string()).default([]),
});

export type TodoistProject = z.infer<typeof projectSchema>;
export type TodoistTask = z.infer<typeof taskSchema>;

// Listing page; items are checked against the caller's schema.
const pageSchema = z.object({
  results: z.array(z.unknown()),
  next_cursor: z.string().nullable().optional(),
});

export interface TodoistClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs?: number;
  retry: RetryPolicy;
  fetchFn?: typeof fetch;
  retryOptions?: Pick<RetryOptions, 'sleep' | 'random'>;
}

// Minimal client for the Todoist API v1 endpoints the miner uses.
export class TodoistClient {
  private fetchFn: typeof fetch;
  private baseUrl: string;

  constructor(private options: TodoistClientOptions, private logger: Logger) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  private async send(method: 'GET' | 'POST', path: string, body?: object): Promise<unknown> {
    const headers: Record<string, string> = { Authorization: `Bearer ${this.options.apiKey}` };
    if (body) headers['Content-Type'] = 'application/json';

    let res: Response;
    try {
      res = await this.fetchFn(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: body ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 15000),
      });
    } catch (error) {
      throw new TodoistError(`Todoist unreachable (${method} ${path}): ${errorMessage(error)}`, true, undefined, {
        cause: error,
      });
    }

    if (!res.ok) {
      const retryable = res.status === 429 || res.status >= 500;
      throw new TodoistError(`Todoist HTTP ${res.status} (${method} ${path})`, retryable, res.status);
    }
    if (res.status === 204) return null;
    const text = await res.text();
    if (!text) return null;
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new TodoistError(`Todoist returned invalid JSON (${method} ${path})`, true, res.status, { cause: error });
    }
  }

  private async call<T>(
    method: 'GET' | 'POST',
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: object
  ): Promise<T> {
    return withRetry(
      async () => {
        const json = await this.send(method, path, body);
        const parsed = schema.safeParse(json);
        if (!parsed.success) {
          throw new TodoistError(`Unexpected Todoist response (${method} ${path})`, false);
        }
        return parsed.data;
      },
      this.options.retry,
      {
        ...this.options.retryOptions,
        shouldRetry: (error) => error instanceof TodoistError && error.retryable,
        onRetry: (error, attempt, delayMs) =>
          this.logger.warn(`[Todoist] ${method} ${path} failed (attempt ${attempt}), retrying in ${delayMs}ms: ${errorMessage(error)}`),
      }
    );
  }

  private async paginate<I>(
    path: string,
    item: z.ZodType<I, z.ZodTypeDef, unknown>,
    query: Record<string, string> = {}
  ): Promise<I[]> {
    const out: I[] = [];
    let cursor: string | null | undefined;
    do {
      const params = new URLSearchParams(query);
      if (cursor) params.set('cursor', cursor);
      const qs = params.toString();
      const page = await this.call('GET', qs ? `${path}?${qs}` : path, pageSchema);
      const items = z.array(item).safeParse(page.results);
      if (!items.success) {
        throw new TodoistError(`Unexpected Todoist response (GET ${path})`, false);
      }
      out.push(...items.data);
      cursor = page.next_cursor;
    } while (cursor);
    return out;
  }

  getProjects(): Promise<TodoistProject[]> {
    return this.paginate('/projects', projectSchema);
  }

  getTasks(projectId: string): Promise<TodoistTask[]> {
    return this.paginate('/tasks', taskSchema, { project_id: projectId });
  }

  getTask(taskId: string): Promise<TodoistTask> {
    return this.call('GET', `/tasks/${encodeURIComponent(taskId)}`, taskSchema);
  }

  async updateTaskLabels(taskId: string, labels: string[]): Promise<void> {
    await this.call('POST', `/tasks/${encodeURIComponent(taskId)}`, z.unknown(), { labels });
  }

  async closeTask(taskId: string): Promise<void> {
    await this.call('POST', `/tasks/${encodeURIComponent(taskId)}/close`, z.unknown());
  }
}
