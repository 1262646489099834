import 'server-only';

import { createChatServerLogger, createProfileChatServer } from '@profile-chat/chat-next-api';
import { loadChatConfig, resolveChatConfig } from './config';

export const chatConfig = resolveChatConfig(loadChatConfig());
export const chatLogger = createChatServerLogger();

const bootstrapped = createProfileChatServer({
  profilePath: chatConfig.profilePath,
  generation: chatConfig.generation,
  logger: chatLogger,
  logPrompts: chatConfig.logPrompts,
});

export const chatApi = bootstrapped.chatApi;
export const profileRepository = bootstrapped.providers.profileRepository;
