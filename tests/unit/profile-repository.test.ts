import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ProfileLoadError } from '@profile-chat/chat-contract';
import { createFilesystemProfileRepository } from '@profile-chat/chat-data';
import { TEST_PROFILE, TEST_PROFILE_ALT, toProfileDocument } from '@profile-chat/test-support/fixtures';

describe('createFilesystemProfileRepository', () => {
  let dir: string;
  let profilePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'profile-repo-'));
    profilePath = path.join(dir, 'personal_info.json');
    await writeFile(profilePath, toProfileDocument(TEST_PROFILE));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('keeps serving the cached profile after the file changes', async () => {
    const repository = createFilesystemProfileRepository({ profilePath });
    const first = await repository.getProfile();

    await writeFile(profilePath, toProfileDocument(TEST_PROFILE_ALT));

    const second = await repository.getProfile();
    expect(second).toBe(first);
    expect(second.name).toBe('Avery Quinn');
  });

  it('replaces the profile wholesale on reload', async () => {
    const repository = createFilesystemProfileRepository({ profilePath });
    await repository.getProfile();

    await writeFile(profilePath, toProfileDocument(TEST_PROFILE_ALT));
    const reloaded = await repository.reload();

    expect(reloaded).toEqual(TEST_PROFILE_ALT);
    expect(await repository.getProfile()).toBe(reloaded);
  });

  it('reads the file again after invalidate', async () => {
    const repository = createFilesystemProfileRepository({ profilePath });
    await repository.getProfile();

    await writeFile(profilePath, toProfileDocument(TEST_PROFILE_ALT));
    repository.invalidate();

    expect((await repository.getProfile()).name).toBe('Jordan Lee');
  });

  it('shares one read between concurrent callers', async () => {
    const logger = vi.fn();
    const repository = createFilesystemProfileRepository({ profilePath, logger });

    const [a, b] = await Promise.all([repository.getProfile(), repository.getProfile()]);

    expect(a).toBe(b);
    expect(logger.mock.calls.filter(([event]) => event === 'profile.load.success')).toHaveLength(1);
  });

  it('leaves the cache empty when a reload fails', async () => {
    const repository = createFilesystemProfileRepository({ profilePath });
    await repository.getProfile();

    await writeFile(profilePath, '{ broken');
    await expect(repository.reload()).rejects.toBeInstanceOf(ProfileLoadError);
    await expect(repository.getProfile()).rejects.toMatchObject({ code: 'profile_parse_error' });

    await writeFile(profilePath, toProfileDocument(TEST_PROFILE_ALT));
    expect((await repository.getProfile()).name).toBe('Jordan Lee');
  });

  it('does not cache a failed first load', async () => {
    await rm(profilePath);
    const repository = createFilesystemProfileRepository({ profilePath });

    await expect(repository.getProfile()).rejects.toMatchObject({ code: 'profile_not_found' });

    await writeFile(profilePath, toProfileDocument(TEST_PROFILE));
    expect((await repository.getProfile()).name).toBe('Avery Quinn');
  });

  it('logs invalidation', () => {
    const logger = vi.fn();
    const repository = createFilesystemProfileRepository({ profilePath, logger });

    repository.invalidate();

    expect(logger).toHaveBeenCalledWith('profile.invalidate', { path: profilePath, generation: 1 });
  });
});
