import { describe, it, expect, beforeEach, vi } from 'vitest';
import { loadConfig, type LlmConfig } from '../config.js';
import { UpstreamUnavailableError } from '../errors.js';
import { LlmClient } from './client.js';

interface Call {
  url: string;
  body: unknown;
  headers: Record<string, string>;
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function stubFetch(handler: (url: string) => Response) {
  const calls: Call[] = [];
  const fn: typeof fetch = async (input, init) => {
    const url = String(input);
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => { headers[key] = value; });
    calls.push({ url, body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined, headers });
    return handler(url);
  };
  return { fn, calls };
}

function llmConfig(overrides: Partial<LlmConfig>): LlmConfig {
  return { ...loadConfig({}).llm, ...overrides };
}

const ANTHROPIC_URL = 'https://api.anthropic.com/v1/messages';

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

describe('LlmClient', () => {
  it('calls the Anthropic API when it is the configured provider', async () => {
    const { fn, calls } = stubFetch(() => json({ content: [{ type: 'text', text: ' Hello ' }] }));
    const client = new LlmClient(llmConfig({ provider: 'anthropic', anthropicApiKey: 'test-secret-key' }), fn);

    expect(await client.complete('Say hello')).toBe('Hello');
    expect(client.getActiveProvider()).toBe('anthropic');
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe(ANTHROPIC_URL);
    expect(calls[0].headers['x-api-key']).toBe('test-secret-key');
    expect(calls[0].body).toMatchObject({ max_tokens: 4000, messages: [{ role: 'user', content: 'Say hello' }] });
  });

  it('prefers a detected Ollama model', async () => {
    const { fn, calls } = stubFetch(url =>
      url.endsWith('/api/tags') ? json({ models: [{ name: 'llama3.1:8b' }] }) : json({ response: ' Hi there ' }));
    const client = new LlmClient(llmConfig({}), fn);

    expect(await client.complete('Hello')).toBe('Hi there');
    expect(client.getActiveProvider()).toBe('ollama');
    expect(calls[1].url).toBe('http://localhost:11434/api/generate');
    expect(calls[1].body).toMatchObject({ model: 'llama3.1:8b', prompt: 'Hello', stream: false });
  });

  it('uses whichever Ollama model is installed', async () => {
    const { fn, calls } = stubFetch(url =>
      url.endsWith('/api/tags') ? json({ models: [{ name: 'mistral:7b' }] }) : json({ response: 'ok' }));
    await new LlmClient(llmConfig({}), fn).complete('Hello');
    expect(calls[1].body).toMatchObject({ model: 'mistral:7b' });
  });

  it('falls back to Anthropic when Ollama fails', async () => {
    const { fn, calls } = stubFetch(url => {
      if (url.endsWith('/api/tags')) return json({ models: [{ name: 'llama3.1:8b' }] });
      if (url.endsWith('/api/generate')) return json({ error: 'boom' }, 500);
      return json({ content: [{ type: 'text', text: 'From Anthropic' }] });
    });
    const client = new LlmClient(llmConfig({ anthropicApiKey: 'test-secret-key' }), fn);

    expect(await client.complete('Hello')).toBe('From Anthropic');
    expect(calls.map(c => c.url)).toEqual([
      'http://localhost:11434/api/tags',
      'http://localhost:11434/api/generate',
      ANTHROPIC_URL,
    ]);
  });

  it('fails with upstream-unavailable when nothing is configured', async () => {
    const { fn } = stubFetch(() => {
      throw new TypeError('fetch failed');
    });
    const client = new LlmClient(llmConfig({}), fn);

    await expect(client.complete('Hello')).rejects.toThrow(UpstreamUnavailableError);
    expect(client.getActiveProvider()).toBe('none');
  });

  it('wraps an HTTP error from Anthropic', async () => {
    const { fn } = stubFetch(() => json({ error: 'rate limited' }, 429));
    const client = new LlmClient(llmConfig({ provider: 'anthropic', anthropicApiKey: 'test-secret-key' }), fn);
    await expect(client.complete('Hello')).rejects.toThrow('Anthropic request failed: Anthropic error: 429');
  });
});
