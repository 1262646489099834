import type { ChatLogger } from '@profile-chat/chat-contract';
import { logChatDebug } from './debugLogBuffer';

export type ChatServerLogger = ChatLogger;

/** Logger handed to the profile store, generate client and runtime; `onEvent` mirrors every event. */
export function createChatServerLogger(onEvent?: ChatServerLogger): ChatServerLogger {
  return (event, payload) => {
    logChatDebug(event, payload);
    onEvent?.(event, payload);
  };
}

export {
  CHAT_DEBUG_LEVEL,
  getChatDebugLogs,
  logChatDebug,
  resetChatDebugLogs,
  runWithChatLogContext,
  type ChatDebugLogEntry,
} from './debugLogBuffer';
