import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ProfileLoadError } from '@profile-chat/chat-contract';
import { loadProfileFile, validateProfile } from '@profile-chat/chat-data';
import { TEST_PROFILE, TEST_PROFILE_ALT, toProfileDocument } from '@profile-chat/test-support/fixtures';

describe('loadProfileFile', () => {
  let dir: string;
  let profilePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'profile-loader-'));
    profilePath = path.join(dir, 'personal_info.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns every field exactly as written', async () => {
    await writeFile(profilePath, toProfileDocument(TEST_PROFILE));

    const profile = await loadProfileFile(profilePath);

    expect(profile).toEqual(TEST_PROFILE);
    expect(profile.projects.map((project) => project.name)).toEqual([
      'Client Project: Bakery Ordering Site',
      'Trail Log',
      'Dental Clinic Dashboard (client project)',
    ]);
  });

  it('freezes the loaded profile', async () => {
    await writeFile(profilePath, toProfileDocument(TEST_PROFILE));

    const profile = await loadProfileFile(profilePath);

    expect(Object.isFrozen(profile)).toBe(true);
    expect(Object.isFrozen(profile.skills)).toBe(true);
    expect(Object.isFrozen(profile.projects[0])).toBe(true);
  });

  it('fills omitted github and website fields with empty strings', async () => {
    const { github_profile, portfolio_website, ...rest } = TEST_PROFILE_ALT;
    await writeFile(profilePath, JSON.stringify(rest));

    const profile = await loadProfileFile(profilePath);

    expect(profile.github_profile).toBe('');
    expect(profile.portfolio_website).toBe('');
  });

  it('reports a missing file as profile_not_found', async () => {
    const missing = path.join(dir, 'nope.json');

    const error = await loadProfileFile(missing).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProfileLoadError);
    expect(error).toMatchObject({
      code: 'profile_not_found',
      profilePath: missing,
      message: `Personal information file '${missing}' not found. Please create it.`,
    });
  });

  it('reports malformed JSON as profile_parse_error', async () => {
    await writeFile(profilePath, '{ "name": "Avery", ');

    const error = await loadProfileFile(profilePath).catch((caught: unknown) => caught);

    expect(error).toMatchObject({
      code: 'profile_parse_error',
      message: `Could not parse '${profilePath}'. Please check its JSON format for errors (e.g., missing commas, unclosed brackets).`,
    });
  });

  it('reports a document missing required fields as profile_parse_error', async () => {
    const { skills, ...withoutSkills } = TEST_PROFILE;
    await writeFile(profilePath, JSON.stringify(withoutSkills));

    const error = await loadProfileFile(profilePath).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProfileLoadError);
    expect(error).toMatchObject({ code: 'profile_parse_error' });
    expect(error instanceof Error ? error.message : '').toContain('skills: Required');
  });

  it('reports a directory path as profile_load_unexpected', async () => {
    const error = await loadProfileFile(dir).catch((caught: unknown) => caught);

    expect(error).toMatchObject({ code: 'profile_load_unexpected', profilePath: dir });
  });

  it('logs success and failure events', async () => {
    const logger = vi.fn();
    await writeFile(profilePath, toProfileDocument(TEST_PROFILE));

    await loadProfileFile(profilePath, { logger });
    await loadProfileFile(path.join(dir, 'missing.json'), { logger }).catch(() => undefined);

    expect(logger.mock.calls.map(([event]) => event)).toEqual(['profile.load.success', 'profile.load.error']);
    expect(logger.mock.calls[0]?.[1]).toMatchObject({ path: profilePath, name: 'Avery Quinn', projects: 3 });
  });
});

describe('validateProfile', () => {
  it('lists every schema issue with its path', () => {
    const result = validateProfile({ ...TEST_PROFILE, name: '', projects: [{ name: 'Only a name' }] });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issues).toEqual([
      'name: String must contain at least 1 character(s)',
      'projects.0.description: Required',
    ]);
  });

  it('rejects a document that is not an object', () => {
    expect(validateProfile([1, 2, 3])).toEqual({ ok: false, issues: ['(root): Expected object, received array'] });
  });
});
