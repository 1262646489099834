import type { ChatPostBody } from '@profile-chat/chat-contract';

export const DEFAULT_MAX_MESSAGE_CHARS = 4000;

type ValidationError = { ok: false; error: string; status: number };
type ValidationSuccess = {
  ok: true;
  value: {
    message: string;
  };
};

export function validateChatPostBody(
  body: ChatPostBody | null | undefined,
  options: { maxMessageChars?: number } = {}
): ValidationError | ValidationSuccess {
  const maxMessageChars = options.maxMessageChars ?? DEFAULT_MAX_MESSAGE_CHARS;
  const message = typeof body?.message === 'string' ? body.message : '';
  if (!message.trim()) {
    return { ok: false, error: 'No message provided.', status: 400 };
  }
  if (message.length > maxMessageChars) {
    return { ok: false, error: `Message is longer than ${maxMessageChars} characters.`, status: 413 };
  }
  return { ok: true, value: { message } };
}

export function isChatPostBody(value: unknown): value is ChatPostBody {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}
