import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadChatConfig, parseChatConfig, resolveChatConfig } from '@/server/chat/config';

const ENV_KEYS = [
  'PROFILE_PATH',
  'PERSONAL_INFO_FILE',
  'GENERATION_ENDPOINT',
  'OLLAMA_API_URL',
  'GENERATION_MODEL',
  'OLLAMA_MODEL',
  'CHAT_LOG_PROMPTS',
];

describe('chat config', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'chat-config-'));
    for (const key of ENV_KEYS) {
      vi.stubEnv(key, '');
    }
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(dir, { recursive: true, force: true });
  });

  it('falls back to defaults without a config file', () => {
    expect(loadChatConfig(dir)).toBeUndefined();
    expect(resolveChatConfig(undefined, dir)).toEqual({
      profilePath: path.join(dir, 'personal_info.json'),
      generation: { endpoint: 'http://localhost:11434/api/generate', model: 'gemma3' },
      display: { sectionsExpanded: false },
      logPrompts: false,
    });
  });

  it('reads chat.config.yml', async () => {
    await writeFile(
      path.join(dir, 'chat.config.yml'),
      [
        'profile:',
        '  path: data/me.json',
        'generation:',
        '  endpoint: http://gpu-box:11434/api/generate',
        '  model: llama3',
        'display:',
        '  sectionsExpanded: true',
      ].join('\n')
    );

    const resolved = resolveChatConfig(loadChatConfig(dir), dir);

    expect(resolved).toEqual({
      profilePath: path.join(dir, 'data', 'me.json'),
      generation: { endpoint: 'http://gpu-box:11434/api/generate', model: 'llama3' },
      display: { sectionsExpanded: true },
      logPrompts: false,
    });
  });

  it('lets environment variables win over the file', () => {
    vi.stubEnv('OLLAMA_MODEL', 'phi3');
    vi.stubEnv('PERSONAL_INFO_FILE', '/srv/profile.json');
    vi.stubEnv('CHAT_LOG_PROMPTS', 'true');

    const resolved = resolveChatConfig(parseChatConfig({ generation: { model: 'llama3' } }), dir);

    expect(resolved.generation.model).toBe('phi3');
    expect(resolved.profilePath).toBe('/srv/profile.json');
    expect(resolved.logPrompts).toBe(true);
  });

  it('rejects unknown keys', () => {
    expect(() => parseChatConfig({ genration: {} }, 'chat.config.yml')).toThrow(
      "Invalid chat.config.yml: (root): Unrecognized key(s) in object: 'genration'"
    );
  });

  it('rejects an endpoint that is not a URL', () => {
    expect(() => parseChatConfig({ generation: { endpoint: 'localhost' } })).toThrow(
      'Invalid chat config: generation.endpoint: Invalid url'
    );
  });
});
