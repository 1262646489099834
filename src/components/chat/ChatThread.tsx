'use client';

import { useEffect, useRef } from 'react';
import type { TranscriptEntry } from '@profile-chat/chat-contract';
import { ChatMessageBubble } from '@/components/chat/ChatMessageBubble';

interface ChatThreadProps {
  transcript: readonly TranscriptEntry[];
  isBusy: boolean;
}

function ThinkingSpinner() {
  return (
    <div className="flex w-full justify-start" data-testid="chat-thinking">
      <div className="flex items-center gap-3 px-4 py-2">
        <div className="relative h-4 w-4">
          <div className="absolute inset-0 animate-spin rounded-full border-2 border-white/10 border-t-white/60" />
        </div>
        <span className="text-xs text-white/40">Thinking...</span>
      </div>
    </div>
  );
}

export function ChatThread({ transcript, isBusy }: ChatThreadProps) {
  const endRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    endRef.current?.scrollIntoView({ behavior: 'smooth', block: 'end' });
  }, [transcript.length, isBusy]);

  return (
    <div className="flex flex-col gap-3" aria-live="polite" data-testid="chat-thread">
      {transcript.map((entry) => (
        <ChatMessageBubble key={entry.id} entry={entry} />
      ))}
      {isBusy ? <ThinkingSpinner /> : null}
      <div ref={endRef} />
    </div>
  );
}
