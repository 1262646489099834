'use client';

import {
  createContext,
  useCallback,
  useContext,
  useMemo,
  useRef,
  useState,
  useSyncExternalStore,
  type ReactNode,
} from 'react';
import type { ChatSessionStatus, TranscriptEntry } from '@profile-chat/chat-contract';
import { createChatSession, type ChatSession, type ChatSendResult } from '@profile-chat/chat-orchestrator';
import { requestChatReply, type ChatFetcher } from './chatRequest';

export type ChatProviderProps = {
  children: ReactNode;
  /** First assistant entry of the transcript. */
  greeting: string;
  endpoint?: string;
  fetcher?: ChatFetcher;
  onError?: (error: unknown) => void;
};

interface ChatContextValue {
  transcript: readonly TranscriptEntry[];
  status: ChatSessionStatus;
  isBusy: boolean;
  error: string | null;
  send: (text: string) => Promise<ChatSendResult>;
}

const ChatContext = createContext<ChatContextValue | undefined>(undefined);

export function ChatProvider({ children, greeting, endpoint = '/api/chat', fetcher, onError }: ChatProviderProps) {
  // The session is created once per mount; the latest props are read through this ref.
  const latest = useRef({ endpoint, fetcher, onError });
  latest.current = { endpoint, fetcher, onError };

  const [session] = useState<ChatSession>(() =>
    createChatSession({
      greeting,
      respond: (text) => {
        const resolvedFetcher: ChatFetcher =
          latest.current.fetcher ?? ((input, init) => globalThis.fetch(input, init));
        return requestChatReply(text, { endpoint: latest.current.endpoint, fetcher: resolvedFetcher });
      },
      onError: (error) => {
        console.error('Chat error', error);
        latest.current.onError?.(error);
      },
    })
  );

  const snapshot = useSyncExternalStore(session.subscribe, session.getSnapshot, session.getSnapshot);
  const send = useCallback((text: string) => session.send(text), [session]);

  const value = useMemo<ChatContextValue>(
    () => ({
      transcript: snapshot.transcript,
      status: snapshot.status,
      isBusy: snapshot.status === 'awaiting_response',
      error: snapshot.error,
      send,
    }),
    [snapshot, send]
  );

  return <ChatContext.Provider value={value}>{children}</ChatContext.Provider>;
}

export function useChat() {
  const context = useContext(ChatContext);
  if (!context) {
    throw new Error('useChat must be used within a ChatProvider');
  }
  return context;
}
