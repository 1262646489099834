import type { ChatLogger, Profile } from '@profile-chat/chat-contract';
import { loadProfileFile } from '../../profile';
import type { ProfileRepository } from '../types';

export type FilesystemProfileRepositoryOptions = {
  profilePath: string;
  logger?: ChatLogger;
};

export function createFilesystemProfileRepository(options: FilesystemProfileRepositoryOptions): ProfileRepository {
  let cached: Profile | null = null;
  let pending: Promise<Profile> | null = null;
  // Bumped on every invalidate so a read started before it never lands in the cache.
  let generation = 0;

  function getProfile(): Promise<Profile> {
    if (cached) {
      return Promise.resolve(cached);
    }
    if (!pending) {
      const startedGeneration = generation;
      pending = loadProfileFile(options.profilePath, { logger: options.logger })
        .then((profile) => {
          if (startedGeneration === generation) {
            cached = profile;
          }
          return profile;
        })
        .finally(() => {
          if (startedGeneration === generation) {
            pending = null;
          }
        });
    }
    return pending;
  }

  function invalidate() {
    generation += 1;
    cached = null;
    pending = null;
    options.logger?.('profile.invalidate', { path: options.profilePath, generation });
  }

  return {
    getProfile,
    invalidate,
    async reload() {
      invalidate();
      return getProfile();
    },
  };
}
