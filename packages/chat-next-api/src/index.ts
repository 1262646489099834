export type { ChatbotResponse, ChatRuntime } from '@profile-chat/chat-orchestrator';
export { createProfileChatServer, type BootstrapResult, type ChatBootstrapOptions } from './bootstrap';
export {
  createChatServerLogger,
  logChatDebug,
  getChatDebugLogs,
  resetChatDebugLogs,
  runWithChatLogContext,
  CHAT_DEBUG_LEVEL,
} from './server';
export type { ChatDebugLogEntry, ChatServerLogger } from './server';
export { validateChatPostBody, isChatPostBody, DEFAULT_MAX_MESSAGE_CHARS } from './validation';
export {
  createChatDebugLogsHandler,
  createNextChatHandler,
  createProfileReloadHandler,
  type NextChatHandlerOptions,
  type ProfileReloadHandlerOptions,
} from './nextHandler';
