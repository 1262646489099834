import { revalidatePath } from 'next/cache';
import { createProfileReloadHandler } from '@profile-chat/chat-next-api';
import { chatLogger, profileRepository } from '@/server/chat/bootstrap';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

const reloadHandler = createProfileReloadHandler({
  profiles: profileRepository,
  chatLogger,
  onReloaded: () => revalidatePath('/'),
});

export async function POST() {
  return reloadHandler.POST();
}
