import { randomUUID } from 'node:crypto';
import {
  isProfileLoadError,
  type ChatErrorPayload,
  type ChatPostResponse,
  type GenerationErrorCode,
  type ProfileReloadResponse,
} from '@profile-chat/chat-contract';
import type { ProfileRepository } from '@profile-chat/chat-data';
import type { ChatRuntime } from '@profile-chat/chat-orchestrator';
import { getChatDebugLogs, CHAT_DEBUG_LEVEL, runWithChatLogContext, type ChatServerLogger } from './server';
import { isChatPostBody, validateChatPostBody } from './validation';

export type NextChatHandlerOptions = {
  chatApi: ChatRuntime;
  chatLogger: ChatServerLogger;
  maxMessageChars?: number;
  onErrorLog?: (event: string, payload: Record<string, unknown>) => void;
};

const GENERATION_ERROR_STATUS: Record<GenerationErrorCode, number> = {
  endpoint_unreachable: 503,
  endpoint_request_error: 502,
};

function jsonResponse(body: ChatPostResponse, status = 200): Response {
  return Response.json(body, { status });
}

export function createNextChatHandler(options: NextChatHandlerOptions) {
  const { chatLogger } = options;

  return {
    async POST(request: Request): Promise<Response> {
      const correlationId = randomUUID();
      const body: unknown = await request.json().catch(() => null);
      const validation = validateChatPostBody(isChatPostBody(body) ? body : null, {
        maxMessageChars: options.maxMessageChars,
      });
      if (!validation.ok) {
        return new Response(validation.error, { status: validation.status });
      }

      return runWithChatLogContext({ correlationId }, async () => {
        try {
          const result = await options.chatApi.run(validation.value.message, { signal: request.signal });
          if (!result.ok) {
            return jsonResponse({ error: result.error }, GENERATION_ERROR_STATUS[result.error.code]);
          }
          return jsonResponse({ message: result.message });
        } catch (error) {
          if (isProfileLoadError(error)) {
            chatLogger('api.chat.profile.error', { code: error.code, path: error.profilePath, correlationId });
            const payload: ChatErrorPayload = { code: error.code, message: error.message, retryable: false };
            return jsonResponse({ error: payload }, 500);
          }
          chatLogger('api.chat.error', { error: String(error), correlationId });
          options.onErrorLog?.('api.chat.error', { error: String(error), correlationId });
          return jsonResponse(
            { error: { code: 'internal_error', message: 'Chat unavailable', retryable: false } },
            500
          );
        }
      });
    },
  };
}

export type ProfileReloadHandlerOptions = {
  profiles: ProfileRepository;
  chatLogger: ChatServerLogger;
  /** Runs after a successful reload, e.g. to revalidate the rendered page. */
  onReloaded?: () => void | Promise<void>;
};

export function createProfileReloadHandler(options: ProfileReloadHandlerOptions) {
  return {
    async POST(): Promise<Response> {
      const startedAt = Date.now();
      try {
        const profile = await options.profiles.reload();
        await options.onReloaded?.();
        const durationMs = Date.now() - startedAt;
        options.chatLogger('api.profile.reload', { name: profile.name, durationMs });
        const body: ProfileReloadResponse = { ok: true, name: profile.name, durationMs };
        return Response.json(body);
      } catch (error) {
        if (!isProfileLoadError(error)) {
          options.chatLogger('api.profile.reload.error', { error: String(error) });
          throw error;
        }
        options.chatLogger('api.profile.reload.error', { code: error.code, path: error.profilePath });
        const body: ProfileReloadResponse = { ok: false, error: { code: error.code, message: error.message } };
        return Response.json(body, { status: 500 });
      }
    },
  };
}

export function createChatDebugLogsHandler() {
  return {
    GET(): Response {
      if (process.env.NODE_ENV === 'production') {
        return Response.json({ error: 'Chat logs are not available in production.' }, { status: 404 });
      }
      return Response.json({ level: CHAT_DEBUG_LEVEL, logs: getChatDebugLogs() });
    },
  };
}
