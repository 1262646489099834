export {
  buildGreeting,
  buildSectionLinks,
  categorizeProject,
  composeProfilePrompt,
} from './promptComposer';
export {
  createChatRuntime,
  type ChatbotResponse,
  type ChatRuntime,
  type ChatRuntimeDeps,
  type ChatRuntimeOptions,
} from './runtime/chatRuntime';
export {
  appendTranscriptEntry,
  createChatSession,
  createTranscriptEntry,
  type ChatResponder,
  type ChatSendResult,
  type ChatSession,
  type ChatSessionOptions,
  type ChatSessionSnapshot,
} from './runtime/session';
