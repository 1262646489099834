import { AsyncLocalStorage } from 'node:async_hooks';

type ChatDebugLogEntry = {
  timestamp: string;
  event: string;
  payload?: unknown;
  correlationId?: string;
};

declare global {
  var __profileChatLogBuffer__: ChatDebugLogEntry[] | undefined;
}

/**
 * Levels: 0 silent (errors still print), 1 summaries, 2 raw payloads instead of their summaries,
 * 3 everything with sensitive keys redacted.
 */
const DEBUG_FLAG = process.env.CHAT_DEBUG_LOG;
const parsedLevel = Number.parseInt(DEBUG_FLAG ?? '', 10);
const DEBUG_LEVEL = Number.isFinite(parsedLevel) ? parsedLevel : process.env.NODE_ENV === 'production' ? 0 : 1;
const REDACT_SENSITIVE = DEBUG_LEVEL === 3;
const MAX_LOGS = Math.max(50, Number(process.env.CHAT_DEBUG_LOG_LIMIT ?? 500) || 500);
const BUFFER_ENABLED = process.env.NODE_ENV !== 'production';

// Survives Next.js dev-server module reloads.
globalThis.__profileChatLogBuffer__ ??= [];
const buffer = globalThis.__profileChatLogBuffer__;

type ChatLogContext = {
  correlationId?: string;
};

const chatLogContext = new AsyncLocalStorage<ChatLogContext>();

const RAW_SUFFIX = '.raw';
// Base events hidden at level 2 because their `.raw` twin carries the full payload.
const RAW_PREFERRED_BASE_EVENTS = new Set(['chat.prompt']);
const SENSITIVE_KEY_HINTS = ['key', 'token', 'secret', 'auth', 'cookie', 'password', 'email'];

function isRawEvent(event: string): boolean {
  return event.endsWith(RAW_SUFFIX);
}

function isErrorEvent(event: string): boolean {
  return /(?:^|[._:])(?:error|failure)(?:$|[._:])/i.test(event);
}

function shouldLogEvent(event: string): boolean {
  if (DEBUG_LEVEL < 1) return false;
  if (DEBUG_LEVEL === 1) return !isRawEvent(event);
  if (DEBUG_LEVEL === 2) return !RAW_PREFERRED_BASE_EVENTS.has(event);
  return true;
}

function splitEvent(event: string): { namespace: string; action: string } {
  const [namespace, ...rest] = event.split('.');
  return { namespace: namespace || 'chat', action: rest.join('.') || namespace || 'chat' };
}

function clonePayload(payload: unknown): unknown {
  if (!payload || typeof payload !== 'object') {
    return payload;
  }
  try {
    return JSON.parse(JSON.stringify(payload));
  } catch {
    return String(payload);
  }
}

function redact(key: string, value: unknown): unknown {
  if (typeof value === 'string') {
    const lower = key.toLowerCase();
    return SENSITIVE_KEY_HINTS.some((hint) => lower.includes(hint)) ? '[redacted]' : value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => redact(key, item));
  }
  if (value && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([childKey, child]) => [childKey, redact(childKey, child)]));
  }
  return value;
}

function writeConsole(event: string, payload: unknown, level: 'info' | 'error') {
  const { namespace, action } = splitEvent(event);
  const tags = ['chat-debug', `level-${DEBUG_LEVEL}`];
  const correlationId = chatLogContext.getStore()?.correlationId;
  if (correlationId) {
    tags.push(`cid:${correlationId}`);
  }
  if (isRawEvent(event)) {
    tags.push('raw');
  }
  const prefix = `[${tags.join('|')}] [${namespace}] ${action}`;
  const log = level === 'error' ? console.error : console.info;
  if (payload === undefined) {
    log(prefix);
  } else {
    log(prefix, payload);
  }
}

export function logChatDebug(event: string, payload?: unknown) {
  const isError = isErrorEvent(event);
  const enabled = shouldLogEvent(event);
  if (!isError && !enabled) {
    return;
  }
  const cloned = clonePayload(payload);
  const stored = REDACT_SENSITIVE ? redact('', cloned) : cloned;
  if (BUFFER_ENABLED && enabled) {
    buffer.push({
      timestamp: new Date().toISOString(),
      event,
      payload: stored,
      correlationId: chatLogContext.getStore()?.correlationId,
    });
    if (buffer.length > MAX_LOGS) {
      buffer.splice(0, buffer.length - MAX_LOGS);
    }
  }
  writeConsole(event, stored, isError ? 'error' : 'info');
}

export function getChatDebugLogs(): ChatDebugLogEntry[] {
  if (!BUFFER_ENABLED) return [];
  return buffer.slice();
}

export function resetChatDebugLogs() {
  buffer.length = 0;
}

export const CHAT_DEBUG_LEVEL = DEBUG_LEVEL;

export type { ChatDebugLogEntry };

export function runWithChatLogContext<T>(context: ChatLogContext, callback: () => Promise<T> | T): Promise<T> {
  return chatLogContext.run(context, () => Promise.resolve(callback()));
}
