import type { ChatRole, ChatSessionStatus, TranscriptEntry } from '@profile-chat/chat-contract';

export type ChatSessionSnapshot = {
  status: ChatSessionStatus;
  transcript: readonly TranscriptEntry[];
  /** Message of the most recent failed turn; cleared when the next turn starts. */
  error: string | null;
};

export type ChatResponder = (text: string) => Promise<string>;

export type ChatSendResult = 'answered' | 'failed' | 'ignored';

export type ChatSessionOptions = {
  greeting: string;
  respond: ChatResponder;
  createId?: () => string;
  now?: () => Date;
  onError?: (error: unknown) => void;
};

export type ChatSession = {
  getSnapshot(): ChatSessionSnapshot;
  subscribe(listener: () => void): () => void;
  send(text: string): Promise<ChatSendResult>;
};

export function createTranscriptEntry(
  role: ChatRole,
  text: string,
  options: { id: string; createdAt: string }
): TranscriptEntry {
  return Object.freeze({ id: options.id, role, text, createdAt: options.createdAt });
}

export function appendTranscriptEntry(
  transcript: readonly TranscriptEntry[],
  entry: TranscriptEntry
): readonly TranscriptEntry[] {
  return Object.freeze([...transcript, entry]);
}

function describeError(error: unknown): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  return 'Something went wrong. Mind trying again?';
}

/**
 * Session loop for one visitor. Turns run one at a time: the user entry is appended as soon as a
 * turn starts and the assistant entry only when the responder succeeds. The transcript is kept
 * for display and is never handed to the responder.
 */
export function createChatSession(options: ChatSessionOptions): ChatSession {
  const createId = options.createId ?? (() => crypto.randomUUID());
  const now = options.now ?? (() => new Date());
  const listeners = new Set<() => void>();

  const newEntry = (role: ChatRole, text: string) =>
    createTranscriptEntry(role, text, { id: createId(), createdAt: now().toISOString() });

  const initial: ChatSessionSnapshot = {
    status: 'idle',
    transcript: appendTranscriptEntry([], newEntry('assistant', options.greeting)),
    error: null,
  };
  let snapshot: Readonly<ChatSessionSnapshot> = Object.freeze(initial);

  const commit = (next: Partial<ChatSessionSnapshot>) => {
    const merged: ChatSessionSnapshot = { ...snapshot, ...next };
    snapshot = Object.freeze(merged);
    listeners.forEach((listener) => listener());
  };

  return {
    getSnapshot() {
      return snapshot;
    },
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    async send(text) {
      if (!text.trim() || snapshot.status === 'awaiting_response') {
        return 'ignored';
      }

      commit({
        status: 'awaiting_response',
        transcript: appendTranscriptEntry(snapshot.transcript, newEntry('user', text)),
        error: null,
      });

      try {
        const reply = await options.respond(text);
        commit({
          status: 'idle',
          transcript: appendTranscriptEntry(snapshot.transcript, newEntry('assistant', reply)),
        });
        return 'answered';
      } catch (error) {
        options.onError?.(error);
        commit({ status: 'idle', error: describeError(error) });
        return 'failed';
      }
    },
  };
}
