import { isChatErrorCode, type ChatErrorCode, type ChatErrorPayload } from '@profile-chat/chat-contract';

export type ChatFetcher = (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>;

export class ChatRequestError extends Error {
  readonly code: ChatErrorCode | 'network_error' | 'http_error';
  readonly retryable: boolean;
  readonly status?: number;

  constructor(
    message: string,
    options: { code: ChatRequestError['code']; retryable: boolean; status?: number; cause?: unknown }
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ChatRequestError';
    this.code = options.code;
    this.retryable = options.retryable;
    this.status = options.status;
  }
}

function readMessage(payload: unknown): string | undefined {
  if (payload && typeof payload === 'object' && 'message' in payload && typeof payload.message === 'string') {
    return payload.message;
  }
  return undefined;
}

function readErrorPayload(payload: unknown): ChatErrorPayload | undefined {
  if (!payload || typeof payload !== 'object' || !('error' in payload)) {
    return undefined;
  }
  const { error } = payload;
  if (
    error &&
    typeof error === 'object' &&
    'code' in error &&
    isChatErrorCode(error.code) &&
    'message' in error &&
    typeof error.message === 'string'
  ) {
    return {
      code: error.code,
      message: error.message,
      retryable: 'retryable' in error && error.retryable === true,
    };
  }
  return undefined;
}

async function readBody(response: Response): Promise<{ json?: unknown; text: string }> {
  const text = await response.text();
  try {
    return { json: JSON.parse(text), text };
  } catch {
    return { text };
  }
}

/**
 * Posts one user message and resolves with the assistant's reply. Every failure rejects with a
 * {@link ChatRequestError} whose message is fit to show inline in the transcript.
 */
export async function requestChatReply(
  message: string,
  options: { endpoint?: string; fetcher: ChatFetcher; signal?: AbortSignal }
): Promise<string> {
  let response: Response;
  try {
    response = await options.fetcher(options.endpoint ?? '/api/chat', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ message }),
      signal: options.signal,
    });
  } catch (error) {
    throw new ChatRequestError('Unable to reach the chat service. Mind trying again?', {
      code: 'network_error',
      retryable: true,
      cause: error,
    });
  }

  const body = await readBody(response);
  const reply = readMessage(body.json);
  if (response.ok && reply !== undefined) {
    return reply;
  }

  const errorPayload = readErrorPayload(body.json);
  if (errorPayload) {
    throw new ChatRequestError(errorPayload.message, {
      code: errorPayload.code,
      retryable: errorPayload.retryable,
      status: response.status,
    });
  }

  throw new ChatRequestError(body.text.trim() || `Chat request failed with status ${response.status}.`, {
    code: 'http_error',
    retryable: response.status >= 500,
    status: response.status,
  });
}
