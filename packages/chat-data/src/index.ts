export {
  assertProfile,
  loadProfileFile,
  profileSchema,
  validateProfile,
  type LoadProfileOptions,
  type ProfileValidationResult,
} from './profile';
export type { Profile, ProfileProject } from '@profile-chat/chat-contract';
export type { ProfileRepository } from './providers/types';
export { createFilesystemProfileRepository } from './providers/filesystem/profileRepository';
export type { FilesystemProfileRepositoryOptions } from './providers/filesystem/profileRepository';
