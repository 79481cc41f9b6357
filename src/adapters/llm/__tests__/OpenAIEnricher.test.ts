import OpenAI from 'openai';
import { SourceSentence } from '../../../core/entities/SourceSentence';
import { ClozeError, EnrichmentError } from '../../../core/errors';
import { createMockLogger } from '../../../test/fakes';
import { OpenAIEnricher, tryParseJson } from '../OpenAIEnricher';

type FetchMock = jest.Mock<Promise<Response>, Parameters<typeof fetch>>;

type ContentPart = { type: 'output_text'; text: string; annotations: [] } | { type: 'refusal'; refusal: string };

function modelReply(content: ContentPart[]): Response {
  return new Response(
    JSON.stringify({
      id: 'resp_test',
      object: 'response',
      created_at: 0,
      status: 'completed',
      model: 'gpt-test',
      output: [{ type: 'message', id: 'msg_test', role: 'assistant', status: 'completed', content }],
    }),
    { status: 200, headers: { 'content-type': 'application/json' } }
  );
}

function textReply(text: string): Response {
  return modelReply([{ type: 'output_text', text, annotations: [] }]);
}

function errorReply(status: number): Response {
  return new Response(JSON.stringify({ error: { message: `status ${status}`, type: 'test' } }), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

describe('OpenAIEnricher', () => {
  const item = SourceSentence.create({ id: 't1', entryText: 'english: {run}', sentence: 'I run every morning.' });
  let fetchFn: FetchMock;
  let enricher: OpenAIEnricher;

  beforeEach(() => {
    fetchFn = jest.fn<Promise<Response>, Parameters<typeof fetch>>();
    const client = new OpenAI({ apiKey: 'test-key', baseURL: 'https://llm.test/v1', maxRetries: 0, fetch: fetchFn });
    enricher = new OpenAIEnricher(client, 'gpt-test', createMockLogger(), {
      retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1, jitter: false },
      retryOptions: { sleep: async () => undefined },
    });
  });

  it('should return the definition and example sentence', async () => {
    fetchFn.mockResolvedValueOnce(
      textReply(JSON.stringify({ Definition: ' to move fast on foot ', ExampleSentence: 'Kids run in the park.' }))
    );

    const enriched = await enricher.enrich(item, 'run');

    expect(enriched.word).toBe('run');
    expect(enriched.definition).toBe('to move fast on foot');
    expect(enriched.generatedSentence).toBe('Kids run in the park.');
    expect(enriched.source).toBe(item);

    const [url, init] = fetchFn.mock.calls[0];
    expect(String(url)).toBe('https://llm.test/v1/responses');
    const body = JSON.parse(String(init?.body));
    expect(body.model).toBe('gpt-test');
    expect(body.text.format).toMatchObject({ type: 'json_schema', name: 'sentence_card', strict: true });
    expect(body.input[1].content).toContain('The word appeared in this sentence: "I run every morning."');
  });

  it('should reject a response without a definition and does not retry it', async () => {
    fetchFn.mockResolvedValueOnce(textReply(JSON.stringify({ ExampleSentence: 'Kids run in the park.' })));

    const error = await enricher.enrich(item, 'run').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EnrichmentError);
    expect(error instanceof EnrichmentError && error.message).toBe(
      'Malformed enrichment response for "run" (invalid: Definition)'
    );
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('should retry a server error', async () => {
    fetchFn
      .mockResolvedValueOnce(errorReply(500))
      .mockResolvedValueOnce(textReply('{"Definition":"to move fast","ExampleSentence":"We run."}'));

    await expect(enricher.enrich(item, 'run')).resolves.toMatchObject({ definition: 'to move fast' });
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('should not retry a bad request', async () => {
    fetchFn.mockResolvedValue(errorReply(400));

    await expect(enricher.enrich(item, 'run')).rejects.toBeInstanceOf(EnrichmentError);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('should give up after the retry budget', async () => {
    fetchFn.mockImplementation(async () => errorReply(503));

    await expect(enricher.enrich(item, 'run')).rejects.toBeInstanceOf(EnrichmentError);
    expect(fetchFn).toHaveBeenCalledTimes(3);
  });

  it('should report a refusal', async () => {
    fetchFn.mockResolvedValueOnce(modelReply([{ type: 'refusal', refusal: 'I cannot help with that.' }]));

    await expect(enricher.enrich(item, 'run')).rejects.toThrow(
      'Model refused to respond for "run": I cannot help with that.'
    );
  });

  it('should return the clozed sentence', async () => {
    fetchFn.mockResolvedValueOnce(textReply(' He {{c1::ran}} a marathon.\n'));

    await expect(enricher.createCloze('run', 'He ran a marathon.')).resolves.toBe('He {{c1::ran}} a marathon.');
  });

  it('should wrap cloze request failures in ClozeError', async () => {
    fetchFn.mockResolvedValue(errorReply(401));

    await expect(enricher.createCloze('run', 'He ran a marathon.')).rejects.toBeInstanceOf(ClozeError);
  });
});

describe('tryParseJson', () => {
  it('should read fenced and embedded JSON', () => {
    expect(tryParseJson('```json\n{"a":1}\n```')).toEqual({ a: 1 });
    expect(tryParseJson('Here you go: {"a":2} done')).toEqual({ a: 2 });
    expect(tryParseJson('no json')).toBeNull();
  });
});
