import { afterEach, describe, it, mock } from 'node:test';
import assert from 'node:assert';
import { OllamaProvider } from './ollama-provider.js';
import { OpenAIProvider } from './openai-provider.js';
import { OpenRouterProvider } from './openrouter-provider.js';
import { pick } from './api-provider-base.js';
import type { CompletionRequest } from './llm-provider.interface.js';

const request: CompletionRequest = {
  model: 'test-model',
  messages: [
    { role: 'system', content: 'You review code.' },
    { role: 'user', content: 'Review this.' },
  ],
  maxOutputTokens: 100,
  temperature: 0.1,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

interface SentRequest {
  url: string;
  headers: Record<string, string>;
  body: unknown;
}

function stubFetch(response: () => Response): SentRequest[] {
  const sent: SentRequest[] = [];
  mock.method(globalThis, 'fetch', async (input: string | URL | Request, init?: RequestInit) => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    sent.push({
      url: String(input),
      headers,
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    });
    return response();
  });
  return sent;
}

void describe('providers', async () => {
  afterEach(() => {
    mock.restoreAll();
  });

  await describe('pick', async () => {
    await it('walks objects and arrays', () => {
      assert.strictEqual(pick({ a: [{ b: 'x' }] }, 'a', 0, 'b'), 'x');
      assert.strictEqual(pick({ a: null }, 'a', 'b'), undefined);
    });
  });

  await describe('OpenAIProvider', async () => {
    await it('posts a chat completion request', async () => {
      const sent = stubFetch(() => jsonResponse({ choices: [{ message: { content: '{"issues": []}' } }] }));

      const reply = await new OpenAIProvider('https://llm.test/v1/', 'test-key').complete(request);

      assert.strictEqual(reply, '{"issues": []}');
      assert.strictEqual(sent[0].url, 'https://llm.test/v1/chat/completions');
      assert.strictEqual(sent[0].headers.authorization, 'Bearer test-key');
      assert.strictEqual(sent[0].headers['content-type'], 'application/json');
      assert.deepStrictEqual(sent[0].body, {
        model: 'test-model',
        messages: request.messages,
        temperature: 0.1,
        max_tokens: 100,
      });
    });

    await it('returns null for an empty completion', async () => {
      stubFetch(() => jsonResponse({ choices: [{ message: { content: '' } }] }));
      assert.strictEqual(await new OpenAIProvider('https://llm.test/v1', 'test-key').complete(request), null);
    });

    await it('throws on an error status', async () => {
      stubFetch(() => new Response('bad key', { status: 401, statusText: 'Unauthorized' }));

      await assert.rejects(
        new OpenAIProvider('https://llm.test/v1', 'test-key').complete(request),
        { message: 'LLM API Error (OpenAI): 401 - Unauthorized. Response: bad key' }
      );
    });

    await it('throws on a body without choices', async () => {
      stubFetch(() => jsonResponse({ error: 'nope' }));

      await assert.rejects(
        new OpenAIProvider('https://llm.test/v1', 'test-key').complete(request),
        /OpenAI returned an unexpected response body/
      );
    });
  });

  await describe('OpenRouterProvider', async () => {
    await it('adds the attribution header', async () => {
      const sent = stubFetch(() => jsonResponse({ choices: [{ message: { content: 'ok' } }] }));

      await new OpenRouterProvider('https://router.test/api/v1', 'test-key').complete(request);

      assert.strictEqual(sent[0].url, 'https://router.test/api/v1/chat/completions');
      assert.strictEqual(sent[0].headers['x-title'], 'pr-lens');
      assert.strictEqual(sent[0].headers.authorization, 'Bearer test-key');
    });
  });

  await describe('OllamaProvider', async () => {
    await it('posts a non-streaming chat request', async () => {
      const sent = stubFetch(() => jsonResponse({ message: { role: 'assistant', content: '  hello  ' } }));

      const reply = await new OllamaProvider('http://ollama.test:11434').complete(request);

      assert.strictEqual(reply, 'hello');
      assert.strictEqual(sent[0].url, 'http://ollama.test:11434/api/chat');
      assert.strictEqual(sent[0].headers.authorization, undefined);
      assert.deepStrictEqual(sent[0].body, {
        model: 'test-model',
        messages: request.messages,
        stream: false,
        options: { temperature: 0.1, num_predict: 100 },
      });
    });

    await it('throws when the message is missing', async () => {
      stubFetch(() => jsonResponse({ done: true }));

      await assert.rejects(
        new OllamaProvider('http://ollama.test:11434').complete(request),
        /Ollama returned an unexpected response body/
      );
    });
  });
});
