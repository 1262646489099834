'use client';

import { RefreshCw } from 'lucide-react';
import { useProfileReload } from '@/hooks/useProfileReload';
import { cn } from '@/lib/utils';

export function AppManagementPanel() {
  const reload = useProfileReload();

  return (
    <aside className="mt-10 w-full max-w-3xl border-t border-white/10 pt-6" aria-labelledby="app-management-heading">
      <h2 id="app-management-heading" className="mb-3 font-mono text-xs uppercase tracking-wider text-white/50">
        App Management
      </h2>
      <button
        type="button"
        onClick={() => reload.mutate()}
        disabled={reload.isPending}
        className={cn(
          'flex items-center gap-2 rounded-lg border border-white/20 px-3 py-1.5 text-sm text-white transition-colors',
          reload.isPending ? 'opacity-50' : 'hover:bg-white/10'
        )}
      >
        <RefreshCw className={cn('h-3.5 w-3.5', reload.isPending && 'animate-spin')} />
        Reload Personal Info
      </button>
      {reload.isSuccess ? (
        <p role="status" className="mt-2 text-sm text-emerald-300">
          Personal information reloaded!
        </p>
      ) : null}
      {reload.isError ? (
        <p role="alert" className="mt-2 text-sm text-red-400">
          {reload.error.message}
        </p>
      ) : null}
    </aside>
  );
}
