export type ProfileProject = {
  readonly name: string;
  readonly description: string;
};

export type Profile = {
  readonly name: string;
  readonly occupation: string;
  readonly about_me: string;
  readonly skills: readonly string[];
  readonly education: string;
  readonly contact_email: string;
  readonly linkedin_profile: string;
  readonly github_profile: string;
  readonly portfolio_website: string;
  readonly projects: readonly ProfileProject[];
};

export const PROJECT_CATEGORY_VALUES = ['Client Project', 'Personal Project'] as const;

export type ProjectCategory = (typeof PROJECT_CATEGORY_VALUES)[number];

export const SECTION_KEYS = ['about', 'skills', 'education', 'projects', 'contact'] as const;

export type SectionKey = (typeof SECTION_KEYS)[number];

/**
 * Anchor ids rendered on the page for each profile section.
 * The prompt composer links to these, so they must never change per profile.
 */
export const SECTION_ANCHORS: Readonly<Record<SectionKey, string>> = Object.freeze({
  about: 'about-me',
  skills: 'my-skills',
  education: 'my-education',
  projects: 'my-projects',
  contact: 'contact-me',
});

export type SectionLink = {
  key: SectionKey;
  anchorId: string;
  label: string;
};

export type ChatRole = 'user' | 'assistant';

export type TranscriptEntry = {
  readonly id: string;
  readonly role: ChatRole;
  readonly text: string;
  readonly createdAt: string;
};

export type ChatSessionStatus = 'idle' | 'awaiting_response';

export const PROFILE_ERROR_CODES = ['profile_not_found', 'profile_parse_error', 'profile_load_unexpected'] as const;

export type ProfileErrorCode = (typeof PROFILE_ERROR_CODES)[number];

export const GENERATION_ERROR_CODES = ['endpoint_unreachable', 'endpoint_request_error'] as const;

export type GenerationErrorCode = (typeof GENERATION_ERROR_CODES)[number];

export const CHAT_ERROR_CODES = [...PROFILE_ERROR_CODES, ...GENERATION_ERROR_CODES, 'internal_error'] as const;

export type ChatErrorCode = (typeof CHAT_ERROR_CODES)[number];

export function isChatErrorCode(value: unknown): value is ChatErrorCode {
  return CHAT_ERROR_CODES.some((code) => code === value);
}

export type ChatErrorPayload = {
  code: ChatErrorCode;
  message: string;
  retryable: boolean;
};

export type ChatPostBody = {
  message?: unknown;
};

export type ChatPostResponse = { message: string } | { error: ChatErrorPayload };

export type ProfileReloadResponse =
  | { ok: true; name: string; durationMs: number }
  | { ok: false; error: { code: ProfileErrorCode; message: string } };

export class ProfileLoadError extends Error {
  readonly code: ProfileErrorCode;
  readonly profilePath: string;

  constructor(code: ProfileErrorCode, profilePath: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProfileLoadError';
    this.code = code;
    this.profilePath = profilePath;
  }
}

export class GenerationError extends Error {
  readonly code: GenerationErrorCode;
  readonly status?: number;

  constructor(code: GenerationErrorCode, message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'GenerationError';
    this.code = code;
    this.status = options?.status;
  }
}

export function isProfileLoadError(error: unknown): error is ProfileLoadError {
  return error instanceof ProfileLoadError;
}

export function isGenerationError(error: unknown): error is GenerationError {
  return error instanceof GenerationError;
}

export type ChatLogger = (event: string, payload: Record<string, unknown>) => void;
