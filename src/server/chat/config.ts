import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { DEFAULT_GENERATE_ENDPOINT, DEFAULT_GENERATE_MODEL } from '@profile-chat/chat-llm';
import { resolveEnv } from '@/lib/env';

const chatConfigSchema = z
  .object({
    profile: z
      .object({
        path: z.string().trim().min(1).optional(),
      })
      .optional(),
    generation: z
      .object({
        endpoint: z.string().trim().url().optional(),
        model: z.string().trim().min(1).optional(),
      })
      .optional(),
    display: z
      .object({
        sectionsExpanded: z.boolean().optional(),
      })
      .optional(),
    logging: z
      .object({
        logPrompts: z.boolean().optional(),
      })
      .optional(),
  })
  .strict();

export type ChatConfig = z.infer<typeof chatConfigSchema>;

export type ResolvedChatConfig = {
  profilePath: string;
  generation: {
    endpoint: string;
    model: string;
  };
  display: {
    sectionsExpanded: boolean;
  };
  logPrompts: boolean;
};

export const DEFAULT_PROFILE_FILENAME = 'personal_info.json';
const DEFAULT_CONFIG_FILES = ['chat.config.yml', 'chat.config.yaml', 'chat.config.json'];

function readConfigFile(filePath: string): unknown {
  const ext = path.extname(filePath).toLowerCase();
  const raw = fs.readFileSync(filePath, 'utf-8');
  if (ext === '.json') {
    return JSON.parse(raw);
  }
  return YAML.parse(raw) ?? {};
}

export function parseChatConfig(data: unknown, source = 'chat config'): ChatConfig {
  const parsed = chatConfigSchema.safeParse(data);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid ${source}: ${details}`);
  }
  return parsed.data;
}

export function loadChatConfig(cwd: string = process.cwd()): ChatConfig | undefined {
  for (const candidate of DEFAULT_CONFIG_FILES) {
    const absolute = path.resolve(cwd, candidate);
    if (fs.existsSync(absolute)) {
      return parseChatConfig(readConfigFile(absolute), candidate);
    }
  }
  return undefined;
}

const normalizeBoolean = (value: string | null): boolean | undefined => {
  if (value === null) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true') return true;
  if (normalized === '0' || normalized === 'false') return false;
  return undefined;
};

/**
 * Environment variables win over the config file, which wins over the defaults.
 * Relative profile paths resolve against `cwd`.
 */
export function resolveChatConfig(config?: ChatConfig, cwd: string = process.cwd()): ResolvedChatConfig {
  const profilePath = resolveEnv('PROFILE_PATH') ?? config?.profile?.path ?? DEFAULT_PROFILE_FILENAME;
  return {
    profilePath: path.resolve(cwd, profilePath),
    generation: {
      endpoint: resolveEnv('GENERATION_ENDPOINT') ?? config?.generation?.endpoint ?? DEFAULT_GENERATE_ENDPOINT,
      model: resolveEnv('GENERATION_MODEL') ?? config?.generation?.model ?? DEFAULT_GENERATE_MODEL,
    },
    display: {
      sectionsExpanded: config?.display?.sectionsExpanded ?? false,
    },
    logPrompts: normalizeBoolean(resolveEnv('CHAT_LOG_PROMPTS')) ?? config?.logging?.logPrompts ?? false,
  };
}
