import { createFilesystemProfileRepository, type ProfileRepository } from '@profile-chat/chat-data';
import { createGenerateClient, type Fetcher, type GenerateClient } from '@profile-chat/chat-llm';
import { createChatRuntime, type ChatRuntime } from '@profile-chat/chat-orchestrator';
import type { ChatServerLogger } from './server';

export type ChatBootstrapOptions = {
  profilePath: string;
  generation: {
    endpoint: string;
    model: string;
  };
  logger?: ChatServerLogger;
  logPrompts?: boolean;
  fetcher?: Fetcher;
};

export type BootstrapResult = {
  providers: {
    profileRepository: ProfileRepository;
    generateClient: GenerateClient;
  };
  chatApi: ChatRuntime;
};

export function createProfileChatServer(options: ChatBootstrapOptions): BootstrapResult {
  const profileRepository = createFilesystemProfileRepository({
    profilePath: options.profilePath,
    logger: options.logger,
  });
  const generateClient = createGenerateClient({
    endpoint: options.generation.endpoint,
    fetcher: options.fetcher,
    logger: options.logger,
  });
  const chatApi = createChatRuntime(
    { profiles: profileRepository, llm: generateClient },
    { model: options.generation.model, logger: options.logger, logPrompts: options.logPrompts }
  );

  return {
    providers: { profileRepository, generateClient },
    chatApi,
  };
}
