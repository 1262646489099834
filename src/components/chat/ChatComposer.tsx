'use client';

import { useCallback, useState, type FormEvent } from 'react';
import { motion } from 'framer-motion';
import { SendHorizontal } from 'lucide-react';
import { cn } from '@/lib/utils';

interface ChatComposerProps {
  isBusy: boolean;
  placeholder: string;
  onSend: (text: string) => Promise<unknown>;
}

export function ChatComposer({ isBusy, placeholder, onSend }: ChatComposerProps) {
  const [value, setValue] = useState('');

  const handleSubmit = useCallback(
    async (event: FormEvent<HTMLFormElement>) => {
      event.preventDefault();
      if (!value.trim() || isBusy) return;
      setValue('');
      await onSend(value);
    },
    [isBusy, onSend, value]
  );

  const isSendDisabled = isBusy || !value.trim();

  return (
    <motion.form
      layoutId="chat-composer"
      className="mt-4"
      onSubmit={handleSubmit}
      transition={{ type: 'tween', duration: 0.4, ease: [0.2, 0, 0.2, 1] }}
    >
      <div className="mx-auto flex max-w-3xl items-center gap-3">
        <input
          type="text"
          value={value}
          onChange={(event) => setValue(event.target.value)}
          placeholder={placeholder}
          aria-label="Chat message"
          disabled={isBusy}
          className="h-10 flex-1 rounded-lg border border-gray-700 bg-black/50 px-3 text-base text-white backdrop-blur-sm transition-all duration-200 placeholder:text-gray-500 hover:border-gray-600 focus:outline-none disabled:opacity-50"
        />
        <button
          type="submit"
          disabled={isSendDisabled}
          aria-label="Send message"
          className={cn(
            'flex h-10 w-10 items-center justify-center rounded-lg border border-white/20 text-white transition-colors',
            isSendDisabled ? 'opacity-40' : 'hover:bg-white/10'
          )}
        >
          <SendHorizontal className="h-4 w-4" />
        </button>
      </div>
    </motion.form>
  );
}
