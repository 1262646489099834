import {
  isGenerationError,
  type ChatErrorPayload,
  type ChatLogger,
  type GenerationErrorCode,
} from '@profile-chat/chat-contract';
import type { ProfileRepository } from '@profile-chat/chat-data';
import type { GenerateClient } from '@profile-chat/chat-llm';
import { composeProfilePrompt } from '../promptComposer';

export type ChatRuntimeOptions = {
  model: string;
  logger?: ChatLogger;
  /** Also emit `chat.prompt.raw` carrying the full composed prompt. */
  logPrompts?: boolean;
};

export type ChatRuntimeDeps = {
  profiles: ProfileRepository;
  llm: GenerateClient;
};

export type ChatbotResponse =
  | { ok: true; message: string; model: string; durationMs: number }
  | { ok: false; error: ChatErrorPayload & { code: GenerationErrorCode } };

export type ChatRuntime = {
  run(userQuery: string, options?: { signal?: AbortSignal }): Promise<ChatbotResponse>;
};

/**
 * One stateless turn: read the profile, compose the prompt, call the generate endpoint.
 * Generation failures come back as `{ ok: false }`; profile load failures are thrown because
 * nothing can be answered without a complete profile.
 */
export function createChatRuntime(deps: ChatRuntimeDeps, options: ChatRuntimeOptions): ChatRuntime {
  const { logger } = options;

  return {
    async run(userQuery, runOptions) {
      const startedAt = Date.now();
      const profile = await deps.profiles.getProfile();
      const prompt = composeProfilePrompt(profile, userQuery);
      logger?.('chat.prompt', { queryChars: userQuery.length, promptChars: prompt.length });
      if (options.logPrompts) {
        logger?.('chat.prompt.raw', { prompt });
      }

      try {
        const message = await deps.llm.generate({
          prompt,
          model: options.model,
          signal: runOptions?.signal,
          stage: 'answer',
        });
        const durationMs = Date.now() - startedAt;
        logger?.('chat.turn.complete', { model: options.model, durationMs });
        return { ok: true, message, model: options.model, durationMs };
      } catch (error) {
        if (!isGenerationError(error)) {
          throw error;
        }
        logger?.('chat.turn.error', { code: error.code, status: error.status ?? null });
        return {
          ok: false,
          error: { code: error.code, message: error.message, retryable: true },
        };
      }
    },
  };
}
