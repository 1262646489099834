import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ProfileLoadError, type ChatLogger, type Profile } from '@profile-chat/chat-contract';

const projectSchema = z.object({
  name: z.string(),
  description: z.string(),
});

// github_profile and portfolio_website may be left empty or omitted.
export const profileSchema = z.object({
  name: z.string().min(1),
  occupation: z.string(),
  about_me: z.string(),
  skills: z.array(z.string()),
  education: z.string(),
  contact_email: z.string(),
  linkedin_profile: z.string(),
  github_profile: z.string().default(''),
  portfolio_website: z.string().default(''),
  projects: z.array(projectSchema),
});

export type ProfileValidationResult = { ok: true; profile: Profile } | { ok: false; issues: string[] };

export function validateProfile(data: unknown): ProfileValidationResult {
  const parsed = profileSchema.safeParse(data);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    };
  }
  return { ok: true, profile: freezeProfile(parsed.data) };
}

export function assertProfile(data: unknown): Profile {
  return freezeProfile(profileSchema.parse(data));
}

function freezeProfile(profile: Profile): Profile {
  return Object.freeze({
    ...profile,
    skills: Object.freeze([...profile.skills]),
    projects: Object.freeze(profile.projects.map((project) => Object.freeze({ ...project }))),
  });
}

function readErrorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export type LoadProfileOptions = {
  logger?: ChatLogger;
};

/**
 * Reads and validates a profile document. Every failure surfaces as a {@link ProfileLoadError};
 * callers are expected to stop rather than continue with a partial profile.
 */
export async function loadProfileFile(profilePath: string, options: LoadProfileOptions = {}): Promise<Profile> {
  const startedAt = Date.now();
  try {
    const profile = await readProfile(profilePath);
    options.logger?.('profile.load.success', {
      path: profilePath,
      name: profile.name,
      projects: profile.projects.length,
      durationMs: Date.now() - startedAt,
    });
    return profile;
  } catch (error) {
    const loadError =
      error instanceof ProfileLoadError
        ? error
        : new ProfileLoadError(
            'profile_load_unexpected',
            profilePath,
            `An unexpected error occurred while loading '${profilePath}': ${String(error)}`,
            { cause: error }
          );
    options.logger?.('profile.load.error', { path: profilePath, code: loadError.code, message: loadError.message });
    throw loadError;
  }
}

async function readProfile(profilePath: string): Promise<Profile> {
  let raw: string;
  try {
    raw = await readFile(profilePath, 'utf-8');
  } catch (error) {
    if (readErrorCode(error) === 'ENOENT') {
      throw new ProfileLoadError(
        'profile_not_found',
        profilePath,
        `Personal information file '${profilePath}' not found. Please create it.`,
        { cause: error }
      );
    }
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ProfileLoadError(
      'profile_parse_error',
      profilePath,
      `Could not parse '${profilePath}'. Please check its JSON format for errors (e.g., missing commas, unclosed brackets).`,
      { cause: error }
    );
  }

  const validation = validateProfile(data);
  if (!validation.ok) {
    throw new ProfileLoadError(
      'profile_parse_error',
      profilePath,
      `'${profilePath}' is not a valid profile: ${validation.issues.join('; ')}`
    );
  }
  return validation.profile;
}
