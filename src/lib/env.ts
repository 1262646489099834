const ENV_ALIASES = {
  PROFILE_PATH: ['PROFILE_PATH', 'PERSONAL_INFO_FILE'],
  GENERATION_ENDPOINT: ['GENERATION_ENDPOINT', 'OLLAMA_API_URL'],
  GENERATION_MODEL: ['GENERATION_MODEL', 'OLLAMA_MODEL'],
  CHAT_LOG_PROMPTS: ['CHAT_LOG_PROMPTS'],
} as const;

export type KnownEnvKey = keyof typeof ENV_ALIASES;

function assignCanonicalValue(candidates: readonly string[], sourceKey: string, value: string) {
  const canonical = candidates[0];
  if (!canonical) {
    return;
  }

  if (!process.env[canonical] || canonical === sourceKey) {
    process.env[canonical] = value;
  }
}

/** First non-empty value among the key and its aliases; the canonical name is backfilled. */
export function resolveEnv(key: KnownEnvKey): string | null {
  const candidates = ENV_ALIASES[key];
  for (const candidate of candidates) {
    const value = process.env[candidate]?.trim();
    if (value) {
      assignCanonicalValue(candidates, candidate, value);
      return value;
    }
  }
  return null;
}
