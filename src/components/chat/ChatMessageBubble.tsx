'use client';

import type { TranscriptEntry } from '@profile-chat/chat-contract';
import { cn } from '@/lib/utils';
import { ChatMarkdown } from './ChatMarkdown';

interface ChatMessageBubbleProps {
  entry: TranscriptEntry;
}

export function ChatMessageBubble({ entry }: ChatMessageBubbleProps) {
  const isUser = entry.role === 'user';

  const wrapperClass = isUser
    ? 'inline-block max-w-[85%] sm:max-w-[70%] rounded-2xl border border-white/20 bg-white/10 px-4 py-3 text-sm text-white text-left shadow-xl'
    : 'w-full max-w-full sm:max-w-[85%] space-y-3 text-sm text-white';

  if (!entry.text.trim()) {
    return null;
  }

  return (
    <div className={cn('flex w-full', isUser ? 'justify-end' : 'justify-start')}>
      <div className={wrapperClass} data-testid={isUser ? 'chat-user-message' : 'chat-assistant-message'}>
        {isUser ? (
          <p className="whitespace-pre-wrap text-sm leading-relaxed">{entry.text}</p>
        ) : (
          <ChatMarkdown text={entry.text} />
        )}
      </div>
    </div>
  );
}
