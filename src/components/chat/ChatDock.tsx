'use client';

import { useChat } from '@profile-chat/chat-next-ui';
import { ChatThread } from '@/components/chat/ChatThread';
import { ChatComposer } from './ChatComposer';

type ChatDockProps = {
  profileName: string;
};

export default function ChatDock({ profileName }: ChatDockProps) {
  const { transcript, isBusy, send, error } = useChat();

  return (
    <div className="relative w-full max-w-3xl rounded-2xl shadow-2xl">
      <ChatThread transcript={transcript} isBusy={isBusy} />
      <ChatComposer
        isBusy={isBusy}
        onSend={send}
        placeholder={`Ask me something about ${profileName} or anything else!`}
      />
      {error ? (
        <p role="alert" className="mt-2 text-sm text-red-400">
          {error}
        </p>
      ) : null}
    </div>
  );
}
