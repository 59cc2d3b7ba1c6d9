import { describe, expect, it } from 'vitest';

import { makeTelegramClient } from '@/modules/conversation/index.js';

import { testLogger } from '../../fixtures/fakes.js';

interface RecordedRequest {
  url: string;
  body: unknown;
}

const makeFetch = (status: number, payload: unknown) => {
  const requests: RecordedRequest[] = [];
  const fetchFn: typeof fetch = async (input, init) => {
    requests.push({
      url: String(input),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : null,
    });
    return new Response(JSON.stringify(payload), { status });
  };
  return { requests, fetchFn };
};

const makeClient = (fetchFn: typeof fetch) =>
  makeTelegramClient({
    botToken: 'test-token',
    apiBaseUrl: 'https://telegram.invalid/',
    logger: testLogger,
    fetchFn,
  });

describe('makeTelegramClient', () => {
  it('posts the method payload', async () => {
    const { requests, fetchFn } = makeFetch(200, { ok: true, result: true });

    const result = await makeClient(fetchFn).sendMessage({ chat_id: 5, text: 'hi' });

    expect(result.isOk()).toBe(true);
    expect(requests).toEqual([
      {
        url: 'https://telegram.invalid/bottest-token/sendMessage',
        body: { chat_id: 5, text: 'hi' },
      },
    ]);
  });

  it('classifies a rejected call', async () => {
    const { fetchFn } = makeFetch(400, {
      ok: false,
      error_code: 400,
      description: 'Bad Request: message is not modified',
    });

    const result = await makeClient(fetchFn).editMessageText({
      chat_id: 5,
      message_id: 1,
      text: 'hi',
    });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'REJECTED',
      message: 'Bad Request: message is not modified',
      retryable: false,
      statusCode: 400,
    });
  });

  it('marks rate limits as retryable', async () => {
    const { fetchFn } = makeFetch(429, { ok: false, error_code: 429, description: 'Too Many Requests' });

    const result = await makeClient(fetchFn).answerCallbackQuery({ callback_query_id: 'cb-1' });

    expect(result._unsafeUnwrapErr()).toMatchObject({ type: 'RATE_LIMITED', retryable: true });
  });

  it('classifies a network failure', async () => {
    const fetchFn: typeof fetch = async () => {
      throw new Error('connect ECONNREFUSED');
    };

    const result = await makeClient(fetchFn).sendMessage({ chat_id: 5, text: 'hi' });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'NETWORK',
      message: 'connect ECONNREFUSED',
      retryable: true,
    });
  });

  it('rejects an unexpected body', async () => {
    const { fetchFn } = makeFetch(200, { result: true });

    const result = await makeClient(fetchFn).sendMessage({ chat_id: 5, text: 'hi' });

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'UNKNOWN',
      message: 'Unexpected response shape',
    });
  });
});
