import { afterEach, describe, expect, it, vi } from 'vitest';
import { errorResponse, jsonResponse } from '../../__test-setup__.js';
import { DEFAULT_GENERATION_MODEL, createClaudeGenerator } from './client.js';

function messageResponse(content: { type: string; text?: string }[]): Response {
  return jsonResponse({ id: 'msg_test', type: 'message', role: 'assistant', content });
}

describe('createClaudeGenerator', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('requires an API key', () => {
    expect(() => createClaudeGenerator({ apiKey: '' })).toThrow('ANTHROPIC_API_KEY is required for generation');
  });

  it('sends the prompt as a single user message and returns the text block', async () => {
    const fetchSpy = vi.spyOn(globalThis, 'fetch').mockImplementation(async () =>
      messageResponse([{ type: 'text', text: 'A is the first letter.' }])
    );
    const generator = createClaudeGenerator({ apiKey: 'test-secret', systemPrompt: 'Be brief.' });

    const answer = await generator.generate('A.\n\nWhat is A?', { temperature: 0, max_tokens: 50 });

    expect(answer).toBe('A is the first letter.');
    expect(generator.model).toBe(DEFAULT_GENERATION_MODEL);

    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://api.anthropic.com/v1/messages');
    expect(init?.headers).toMatchObject({ 'x-api-key': 'test-secret', 'anthropic-version': '2023-06-01' });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: DEFAULT_GENERATION_MODEL,
      max_tokens: 50,
      temperature: 0,
      system: 'Be brief.',
      messages: [{ role: 'user', content: 'A.\n\nWhat is A?' }],
    });
  });

  it('applies default sampling parameters', async () => {
    const fetchSpy = vi.spyOn(globalThis, 'fetch').mockImplementation(async () =>
      messageResponse([{ type: 'text', text: 'ok' }])
    );
    const generator = createClaudeGenerator({ apiKey: 'test-secret', model: 'claude-test' });

    await generator.generate('Q', {});

    expect(JSON.parse(String(fetchSpy.mock.calls[0][1]?.body))).toMatchObject({
      model: 'claude-test',
      max_tokens: 1024,
      temperature: 0.3,
    });
  });

  it('returns an empty string when no text block comes back', async () => {
    vi.spyOn(globalThis, 'fetch').mockImplementation(async () => messageResponse([{ type: 'tool_use' }]));
    const generator = createClaudeGenerator({ apiKey: 'test-secret' });

    expect(await generator.generate('Q', {})).toBe('');
  });

  it('throws on a non-retryable API error', async () => {
    const fetchSpy = vi.spyOn(globalThis, 'fetch').mockImplementation(async () => errorResponse(500, 'internal error'));
    const generator = createClaudeGenerator({ apiKey: 'test-secret' });

    await expect(generator.generate('Q', {})).rejects.toThrow('Claude API 500: internal error');
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });
});
