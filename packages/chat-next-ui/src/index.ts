export { ChatProvider, useChat } from './ChatProvider';
export type { ChatProviderProps } from './ChatProvider';
export { ChatRequestError, requestChatReply, type ChatFetcher } from './chatRequest';
