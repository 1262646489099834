import { createChatDebugLogsHandler } from '@profile-chat/chat-next-api';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

const logsHandler = createChatDebugLogsHandler();

export function GET() {
  return logsHandler.GET();
}
