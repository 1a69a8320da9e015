import { describe, it, expect, vi } from 'vitest';
import { OllamaClient, normalizeBaseUrl } from '../core/llm.js';
import { BackendError, EmptyOutputError, TransportError } from '../core/errors.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function clientWith(fetchImpl: typeof fetch): OllamaClient {
  return new OllamaClient({
    baseUrl: 'http://localhost:11434',
    model: 'llama2',
    temperature: 0.2,
    fetch: fetchImpl,
  });
}

function connectionRefused(): Error {
  return new TypeError('fetch failed', { cause: Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }) });
}

describe('normalizeBaseUrl', () => {
  it('should strip trailing slashes and the generate endpoint', () => {
    expect(normalizeBaseUrl('http://localhost:11434/')).toBe('http://localhost:11434');
    expect(normalizeBaseUrl('http://localhost:11434/api/generate')).toBe('http://localhost:11434');
  });
});

describe('OllamaClient.generate', () => {
  it('should post a non-streaming request and return the response text', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ response: 'ls -laSh', done: true }));
    const client = clientWith(fetchMock);

    await expect(client.generate('PROMPT')).resolves.toBe('ls -laSh');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:11434/api/generate');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'llama2',
      prompt: 'PROMPT',
      temperature: 0.2,
      stream: false,
      options: { temperature: 0.2, num_predict: 256, top_k: 40, top_p: 0.9 },
    });
  });

  it('should honour a per-call model', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ response: 'pwd' }));
    await clientWith(fetchMock).generate('p', { model: 'codellama' });
    expect(JSON.parse(String(fetchMock.mock.calls[0][1]?.body)).model).toBe('codellama');
  });

  it('should report a backend error field', async () => {
    const client = clientWith(async () => jsonResponse({ error: 'model "llama2" not found, try pulling it first' }));
    const error = await client.generate('p').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(BackendError);
    expect(error).toMatchObject({ message: 'model "llama2" not found, try pulling it first' });
  });

  it('should report a non-2xx status', async () => {
    const client = clientWith(async () => new Response('oops', { status: 500, statusText: 'Internal Server Error' }));
    const error = await client.generate('p').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(BackendError);
    expect(error).toMatchObject({ message: 'HTTP 500 Internal Server Error', status: 500 });
  });

  it('should prefer the error text of a non-2xx JSON body', async () => {
    const client = clientWith(async () => jsonResponse({ error: 'out of memory' }, 503));
    await expect(client.generate('p')).rejects.toMatchObject({ message: 'out of memory', status: 503 });
  });

  it('should report an empty response', async () => {
    await expect(clientWith(async () => jsonResponse({ response: '' })).generate('p'))
      .rejects.toBeInstanceOf(EmptyOutputError);
    await expect(clientWith(async () => jsonResponse({ done: true })).generate('p'))
      .rejects.toBeInstanceOf(EmptyOutputError);
    await expect(clientWith(async () => new Response('', { status: 200 })).generate('p'))
      .rejects.toBeInstanceOf(EmptyOutputError);
  });

  it('should treat an absent error key as success', async () => {
    await expect(clientWith(async () => jsonResponse({ response: 'df -h', error: null })).generate('p'))
      .resolves.toBe('df -h');
  });

  it('should classify connection failures', async () => {
    const client = clientWith(async () => { throw connectionRefused(); });
    await expect(client.generate('p')).rejects.toMatchObject({ kind: 'connection_failed' });
  });

  it('should classify timeouts', async () => {
    const client = clientWith(async () => {
      throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    });
    const error = await client.generate('p').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ kind: 'timeout', code: 'TRANSPORT_TIMEOUT' });
  });

  it('should time out a server that never answers', async () => {
    const hanging: typeof fetch = (_input, init) => new Promise((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason));
    });
    const client = new OllamaClient({ baseUrl: 'http://localhost:11434', model: 'llama2', timeoutMs: 20, fetch: hanging });
    await expect(client.generate('p')).rejects.toMatchObject({ kind: 'timeout' });
  });
});

describe('OllamaClient model listing', () => {
  it('should list model names and skip malformed records', async () => {
    const client = clientWith(async () => jsonResponse({
      models: [{ name: 'llama2:latest' }, { name: 'codellama:7b' }, { size: 1 }],
    }));
    await expect(client.listModels()).resolves.toEqual(['llama2:latest', 'codellama:7b']);
  });

  it('should tolerate a missing models array', async () => {
    await expect(clientWith(async () => jsonResponse({})).listModels()).resolves.toEqual([]);
  });

  it('should match a model with or without the latest tag', async () => {
    const client = clientWith(async () => jsonResponse({ models: [{ name: 'llama2:latest' }] }));
    await expect(client.hasModel('llama2')).resolves.toBe(true);
    await expect(client.hasModel('llama2:latest')).resolves.toBe(true);
    await expect(client.hasModel('mistral')).resolves.toBe(false);
  });
});

describe('OllamaClient.isReachable', () => {
  it('should be true for a 200 from the tags endpoint', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ models: [] }));
    await expect(clientWith(fetchMock).isReachable()).resolves.toBe(true);
    expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:11434/api/tags');
  });

  it('should be false when the server is down or unhappy', async () => {
    await expect(clientWith(async () => { throw connectionRefused(); }).isReachable()).resolves.toBe(false);
    await expect(clientWith(async () => new Response('', { status: 502 })).isReachable()).resolves.toBe(false);
  });
});
