import { AlertTriangle } from 'lucide-react';
import type { ProfileErrorCode } from '@profile-chat/chat-contract';

type ProfileUnavailableProps = {
  code: ProfileErrorCode;
  message: string;
};

export function ProfileUnavailable({ code, message }: ProfileUnavailableProps) {
  return (
    <div role="alert" className="w-full max-w-3xl rounded-2xl border border-red-500/30 bg-red-500/10 p-6 text-white">
      <div className="mb-2 flex items-center gap-2 text-red-300">
        <AlertTriangle className="h-4 w-4" />
        <h1 className="text-lg font-semibold">Profile unavailable</h1>
      </div>
      <p className="text-sm leading-relaxed">Error: {message}</p>
      <p className="mt-3 font-mono text-xs text-white/40">{code}</p>
    </div>
  );
}
