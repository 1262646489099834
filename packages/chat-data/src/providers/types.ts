import type { Profile } from '@profile-chat/chat-contract';

export interface ProfileRepository {
  /**
   * Return the current profile, reading the backing source on first use or after {@link invalidate}.
   * Rejects with a ProfileLoadError when the source is missing or malformed.
   */
  getProfile(): Promise<Profile>;

  /**
   * Drop any cached profile so the next {@link getProfile} call reads the source again.
   */
  invalidate(): void;

  /**
   * Invalidate and read again, replacing the previous profile as a whole.
   */
  reload(): Promise<Profile>;
}
