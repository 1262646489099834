import { describe, expect, it, vi } from 'vitest';
import { ChatRequestError, requestChatReply, type ChatFetcher } from '@profile-chat/chat-next-ui';

function respondingWith(body: string, status = 200): ChatFetcher {
  return async () => new Response(body, { status });
}

describe('requestChatReply', () => {
  it('posts the message and resolves with the reply', async () => {
    const fetcher = vi.fn<ChatFetcher>(async () => Response.json({ message: 'Hello!' }));

    await expect(requestChatReply('hi', { fetcher })).resolves.toBe('Hello!');

    expect(fetcher).toHaveBeenCalledWith(
      '/api/chat',
      expect.objectContaining({ method: 'POST', body: JSON.stringify({ message: 'hi' }) })
    );
  });

  it('uses the error payload message', async () => {
    const fetcher = respondingWith(
      JSON.stringify({ error: { code: 'endpoint_unreachable', message: 'Could not connect.', retryable: true } }),
      503
    );

    const error = await requestChatReply('hi', { fetcher }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ChatRequestError);
    expect(error).toMatchObject({
      message: 'Could not connect.',
      code: 'endpoint_unreachable',
      retryable: true,
      status: 503,
    });
  });

  it('uses a plain-text body as the message', async () => {
    await expect(requestChatReply('hi', { fetcher: respondingWith('No message provided.', 400) })).rejects.toMatchObject({
      message: 'No message provided.',
      code: 'http_error',
      retryable: false,
      status: 400,
    });
  });

  it('falls back to the status when the body is empty', async () => {
    await expect(requestChatReply('hi', { fetcher: respondingWith('', 500) })).rejects.toMatchObject({
      message: 'Chat request failed with status 500.',
      retryable: true,
    });
  });

  it('reports a network failure', async () => {
    const fetcher: ChatFetcher = () => Promise.reject(new TypeError('Failed to fetch'));

    await expect(requestChatReply('hi', { fetcher, endpoint: '/custom' })).rejects.toMatchObject({
      message: 'Unable to reach the chat service. Mind trying again?',
      code: 'network_error',
    });
  });
});
