import type { ProfileReloadResponse } from '@profile-chat/chat-contract';

export type ReloadFetcher = (input: string, init?: RequestInit) => Promise<Response>;

export const PROFILE_RELOAD_ENDPOINT = '/api/profile/reload';

export type ProfileReloadResult = { name: string; durationMs: number };

function readErrorMessage(payload: unknown): string | null {
  if (!payload || typeof payload !== 'object' || !('error' in payload)) {
    return null;
  }
  const { error } = payload;
  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return null;
}

function isReloadSuccess(payload: unknown): payload is Extract<ProfileReloadResponse, { ok: true }> {
  return (
    typeof payload === 'object' &&
    payload !== null &&
    'ok' in payload &&
    payload.ok === true &&
    'name' in payload &&
    typeof payload.name === 'string' &&
    'durationMs' in payload &&
    typeof payload.durationMs === 'number'
  );
}

/** Asks the server to drop its cached profile and read the file again. */
export async function requestProfileReload(
  fetcher: ReloadFetcher = (input, init) => globalThis.fetch(input, init)
): Promise<ProfileReloadResult> {
  const response = await fetcher(PROFILE_RELOAD_ENDPOINT, { method: 'POST' });
  let payload: unknown = null;
  try {
    payload = await response.json();
  } catch {
    payload = null;
  }
  if (response.ok && isReloadSuccess(payload)) {
    return { name: payload.name, durationMs: payload.durationMs };
  }
  throw new Error(readErrorMessage(payload) ?? `Reload failed with status ${response.status}.`);
}
