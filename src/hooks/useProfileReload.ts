'use client';

import { useMutation } from '@tanstack/react-query';
import { useRouter } from 'next/navigation';
import { requestProfileReload } from '@/lib/profile/reload';

export function useProfileReload() {
  const router = useRouter();

  return useMutation({
    mutationKey: ['profile', 'reload'],
    mutationFn: () => requestProfileReload(),
    // The server component re-reads the profile on the next render.
    onSuccess: () => router.refresh(),
  });
}
