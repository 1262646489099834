import { describe, expect, it, vi } from 'vitest';
import { PROFILE_RELOAD_ENDPOINT, requestProfileReload, type ReloadFetcher } from '@/lib/profile/reload';

describe('requestProfileReload', () => {
  it('posts to the reload route and returns the new name', async () => {
    const fetcher = vi.fn<ReloadFetcher>(async () => Response.json({ ok: true, name: 'Jordan Lee', durationMs: 4 }));

    await expect(requestProfileReload(fetcher)).resolves.toEqual({ name: 'Jordan Lee', durationMs: 4 });
    expect(fetcher).toHaveBeenCalledWith(PROFILE_RELOAD_ENDPOINT, { method: 'POST' });
  });

  it('surfaces the profile error message', async () => {
    const fetcher: ReloadFetcher = async () =>
      Response.json(
        { ok: false, error: { code: 'profile_parse_error', message: "Could not parse 'personal_info.json'." } },
        { status: 500 }
      );

    await expect(requestProfileReload(fetcher)).rejects.toThrow("Could not parse 'personal_info.json'.");
  });

  it('falls back to the status for other failures', async () => {
    const fetcher: ReloadFetcher = async () => new Response('<html>', { status: 502 });

    await expect(requestProfileReload(fetcher)).rejects.toThrow('Reload failed with status 502.');
  });
});
