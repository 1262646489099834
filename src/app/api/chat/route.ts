import { createNextChatHandler } from '@profile-chat/chat-next-api';
import { chatApi, chatLogger } from '@/server/chat/bootstrap';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

const chatHandler = createNextChatHandler({ chatApi, chatLogger });

export async function POST(request: Request) {
  return chatHandler.POST(request);
}
